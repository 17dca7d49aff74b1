import { describe, it, expect } from 'vitest';
import { coerce, formatScalar, isNullToken, stripQuotes } from './scalar.js';
import { TypeMismatchError } from '../errors/index.js';
import type { ScalarValue, TypeName } from '../types/index.js';

describe('coerce', () => {
  describe('int', () => {
    it('parses signed integers, quoted or not', () => {
      expect(coerce('42', 'int')).toBe(42);
      expect(coerce(' -7 ', 'int')).toBe(-7);
      expect(coerce('"42"', 'int')).toBe(42);
    });

    it('rejects decimals and words', () => {
      expect(() => coerce('4.5', 'int')).toThrow(TypeMismatchError);
      expect(() => coerce('abc', 'int')).toThrow('Invalid int value: "abc"');
    });

    it('rejects integers beyond the safe range', () => {
      expect(() => coerce('9007199254740993', 'int')).toThrow('int value out of range');
    });
  });

  describe('float', () => {
    it('parses decimals and exponents', () => {
      expect(coerce('3.14', 'float')).toBe(3.14);
      expect(coerce('1e3', 'float')).toBe(1000);
      expect(coerce('.5', 'float')).toBe(0.5);
      expect(coerce('7', 'float')).toBe(7);
    });

    it('rejects non-finite spellings', () => {
      expect(() => coerce('inf', 'float')).toThrow(TypeMismatchError);
      expect(() => coerce('nan', 'float')).toThrow(TypeMismatchError);
      expect(() => coerce('1e999', 'float')).toThrow('float value out of range');
    });
  });

  describe('str', () => {
    it('removes one pair of quotes', () => {
      expect(coerce('"hello world"', 'str')).toBe('hello world');
      expect(coerce("'it'", 'str')).toBe('it');
      expect(coerce('hello', 'str')).toBe('hello');
    });

    it('keeps a quoted null as text', () => {
      expect(coerce('"null"', 'str')).toBe('null');
    });
  });

  describe('bool', () => {
    it('accepts the yes/no vocabularies', () => {
      expect(['true', 'YES', 'y', '1', 'Да', 'д'].map((t) => coerce(t, 'bool'))).toEqual([
        true,
        true,
        true,
        true,
        true,
        true,
      ]);
      expect(['false', 'No', 'n', '0', 'нет', 'Н'].map((t) => coerce(t, 'bool'))).toEqual([
        false,
        false,
        false,
        false,
        false,
        false,
      ]);
    });

    it('rejects anything else', () => {
      expect(() => coerce('maybe', 'bool')).toThrow('Invalid bool value: "maybe"');
    });
  });

  it('reads unquoted null and none as null for every type', () => {
    expect(coerce('NULL', 'str')).toBeNull();
    expect(coerce('None', 'int')).toBeNull();
    expect(coerce('null', 'bool')).toBeNull();
  });

  it('rejects unsupported types', () => {
    expect(() => coerce('1', 'date')).toThrow(
      "Unsupported type: 'date' (expected one of int, float, str, bool)"
    );
  });
});

describe('stripQuotes', () => {
  it('only strips a matching pair', () => {
    expect(stripQuotes(`'a"`)).toBe(`'a"`);
    expect(stripQuotes('"x"')).toBe('x');
    expect(stripQuotes('"')).toBe('"');
  });
});

describe('isNullToken', () => {
  it('matches case-insensitively after trimming', () => {
    expect(isNullToken(' nUll ')).toBe(true);
    expect(isNullToken('"null"')).toBe(false);
  });
});

describe('formatScalar', () => {
  it('renders values as tokens', () => {
    expect(formatScalar(null, 'int')).toBe('null');
    expect(formatScalar('Ann', 'str')).toBe('"Ann"');
    expect(formatScalar(2.5, 'float')).toBe('2.5');
    expect(formatScalar(false, 'bool')).toBe('false');
  });
});

describe('formatScalar then coerce', () => {
  const values: Array<[ScalarValue, TypeName]> = [
    ['say "hi"', 'str'],
    ['"', 'str'],
    ['  padded  ', 'str'],
    ['null', 'str'],
    ['none', 'str'],
    ['', 'str'],
    ["it's", 'str'],
    [1e21, 'float'],
    [1e-7, 'float'],
    [-0, 'float'],
    [0.1, 'float'],
    [-2.5, 'float'],
    [-0, 'int'],
    [-42, 'int'],
    [Number.MAX_SAFE_INTEGER, 'int'],
    [true, 'bool'],
    [false, 'bool'],
    [null, 'int'],
    [null, 'float'],
    [null, 'str'],
    [null, 'bool'],
  ];

  it.each(values)('gives back %j as %s', (value, typeName) => {
    expect(coerce(formatScalar(value, typeName), typeName)).toBe(value);
  });
});
