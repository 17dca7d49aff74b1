/**
 * Scalar coercion: raw text token -> typed value
 *
 * Rules, in order:
 *   1. the token is trimmed
 *   2. an unquoted `null` / `none` (any case) is null for every type
 *   3. one matching pair of surrounding quotes is removed
 *   4. the declared type's parser runs on what is left
 */

import type { ScalarValue, TypeName } from '../types/index.js';
import { NULL_TOKENS, getFieldType } from './registry.js';

/**
 * Remove one matching pair of surrounding single or double quotes
 */
export function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    if ((first === '"' || first === "'") && trimmed[trimmed.length - 1] === first) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

export function isNullToken(raw: string): boolean {
  return NULL_TOKENS.has(raw.trim().toLowerCase());
}

/**
 * Convert a raw token to a value of the given type
 * @throws TypeMismatchError when the type is unknown or the token does not parse
 */
export function coerce(raw: string, typeName: string): ScalarValue {
  const text = raw.trim();
  const fieldType = getFieldType(typeName, raw);
  if (isNullToken(text)) {
    return null;
  }
  return fieldType.parse(stripQuotes(text), raw);
}

/**
 * Render a value as a token that coerces back to the same value
 */
export function formatScalar(value: ScalarValue, typeName: TypeName): string {
  if (value === null) {
    return 'null';
  }
  if (typeName === 'str') {
    return `"${String(value)}"`;
  }
  // String(-0) is "0"
  return Object.is(value, -0) ? '-0' : String(value);
}
