/**
 * Type registry
 *
 * Maps the four column type names to their parse functions. Parsers get
 * text that is already trimmed and unquoted; `raw` is the original token,
 * used only for error messages.
 */

import type { ScalarValue, TypeName } from '../types/index.js';
import { TypeMismatchError } from '../errors/index.js';

export interface FieldType {
  name: TypeName;
  parse: (text: string, raw: string) => ScalarValue;
}

/** Truthy bool tokens (matched case-insensitively) */
export const BOOL_TRUE: ReadonlySet<string> = new Set(['true', '1', 'yes', 'y', 'да', 'д']);

/** Falsy bool tokens (matched case-insensitively) */
export const BOOL_FALSE: ReadonlySet<string> = new Set(['false', '0', 'no', 'n', 'нет', 'н']);

/** Unquoted tokens that coerce to null for every type */
export const NULL_TOKENS: ReadonlySet<string> = new Set(['null', 'none']);

export const SUPPORTED_TYPES: readonly TypeName[] = ['int', 'float', 'str', 'bool'];

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function mismatch(typeName: TypeName, raw: string): TypeMismatchError {
  return new TypeMismatchError(`Invalid ${typeName} value: ${JSON.stringify(raw)}`, typeName, raw);
}

function parseInt64(text: string, raw: string): number {
  if (!INT_PATTERN.test(text)) {
    throw mismatch('int', raw);
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new TypeMismatchError(`int value out of range: ${JSON.stringify(raw)}`, 'int', raw);
  }
  return value;
}

function parseFloat64(text: string, raw: string): number {
  if (!FLOAT_PATTERN.test(text)) {
    throw mismatch('float', raw);
  }
  const value = Number(text);
  // JSON has no representation for Infinity
  if (!Number.isFinite(value)) {
    throw new TypeMismatchError(`float value out of range: ${JSON.stringify(raw)}`, 'float', raw);
  }
  return value;
}

function parseBool(text: string, raw: string): boolean {
  const lowered = text.trim().toLowerCase();
  if (BOOL_TRUE.has(lowered)) return true;
  if (BOOL_FALSE.has(lowered)) return false;
  throw mismatch('bool', raw);
}

export const TYPE_REGISTRY: Readonly<Record<TypeName, FieldType>> = {
  int: { name: 'int', parse: parseInt64 },
  float: { name: 'float', parse: parseFloat64 },
  str: { name: 'str', parse: (text) => text },
  bool: { name: 'bool', parse: parseBool },
};

export function isTypeName(name: string): name is TypeName {
  return SUPPORTED_TYPES.some((type) => type === name);
}

/**
 * Look up a type by name
 * @throws TypeMismatchError when the name is not a supported type
 */
export function getFieldType(name: string, raw: string = ''): FieldType {
  if (!isTypeName(name)) {
    throw new TypeMismatchError(
      `Unsupported type: '${name}' (expected one of ${SUPPORTED_TYPES.join(', ')})`,
      name,
      raw
    );
  }
  return TYPE_REGISTRY[name];
}
