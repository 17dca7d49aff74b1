import { describe, it, expect } from 'vitest';
import { TableSchema, parseColumnSpec } from './table-schema.js';
import { MissingFieldsError, ParseError, SchemaError, UnknownFieldsError, ValidationError } from '../errors/index.js';

const users = TableSchema.fromColumns('users', [
  ['name', 'str'],
  ['age', 'int'],
]);

describe('parseColumnSpec', () => {
  it('splits on the first colon', () => {
    expect(parseColumnSpec('age:int')).toEqual(['age', 'int']);
    expect(parseColumnSpec(' age : int ')).toEqual(['age', 'int']);
  });

  it('requires a colon', () => {
    expect(() => parseColumnSpec('age')).toThrow(ParseError);
  });
});

describe('TableSchema.fromColumns', () => {
  it('keeps declaration order', () => {
    const schema = TableSchema.fromColumns('t', [
      ['zeta', 'str'],
      ['alpha', 'bool'],
    ]);
    expect(schema.fieldNames).toEqual(['zeta', 'alpha']);
  });

  const invalid: Array<[Array<[string, string]>, string]> = [
    [[], 'A table needs at least one column'],
    [[['id', 'int']], "Field 'id' is reserved (assigned automatically)"],
    [
      [
        ['a', 'int'],
        ['a', 'str'],
      ],
      "Duplicate field: 'a'",
    ],
    [[['a', 'date']], "Unsupported type for 'a': 'date' (expected one of int, float, str, bool)"],
    [[['2a', 'int']], 'Invalid field name: "2a"'],
    [[['__proto__', 'int']], 'Invalid field name: "__proto__"'],
    [
      [
        ['__proto__', 'int'],
        ['name', 'str'],
      ],
      'Invalid field name: "__proto__"',
    ],
  ];

  it.each(invalid)('rejects %j', (columns, message) => {
    expect(() => TableSchema.fromColumns('t', columns)).toThrow(new SchemaError(message));
  });
});

describe('typeOf', () => {
  it('knows id and declared fields only', () => {
    expect(users.typeOf('id')).toBe('int');
    expect(users.typeOf('age')).toBe('int');
    expect(users.typeOf('constructor')).toBeUndefined();
  });
});

describe('validateInsert', () => {
  it('coerces every field', () => {
    expect(users.validateInsert({ name: '"Ann"', age: '30' })).toEqual({ name: 'Ann', age: 30 });
  });

  it('checks id, then missing, then unknown fields', () => {
    expect(() => users.validateInsert({ id: '1', name: 'a' })).toThrow("Field 'id' is assigned automatically");
    expect(() => users.validateInsert({ name: 'a', email: 'x' })).toThrow(new MissingFieldsError(['age']));
    expect(() => users.validateInsert({ name: 'a', age: '1', email: 'x' })).toThrow(UnknownFieldsError);
  });

  it('reports a __proto__ key as unknown', () => {
    const values = Object.fromEntries<string>([
      ['name', 'a'],
      ['age', '1'],
      ['__proto__', '2'],
    ]);
    expect(() => users.validateInsert(values)).toThrow(new UnknownFieldsError(['__proto__']));
  });

  it('reports all missing fields', () => {
    expect(() => users.validateInsert({})).toThrow('Missing fields: name, age');
  });
});

describe('validateUpdate', () => {
  it('coerces only the given fields', () => {
    expect(users.validateUpdate({ age: '31' })).toEqual({ age: 31 });
  });

  it('rejects empty, id and unknown changes', () => {
    expect(() => users.validateUpdate({})).toThrow('update requires set');
    expect(() => users.validateUpdate({ id: '3' })).toThrow(ValidationError);
    expect(() => users.validateUpdate({ email: 'x' })).toThrow('Unknown fields: email');
  });
});
