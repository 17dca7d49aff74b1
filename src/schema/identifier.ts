import { ValidationError } from '../errors/index.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Plain-object assignment to this key changes the prototype instead */
const RESERVED_KEYS: ReadonlySet<string> = new Set(['__proto__']);

export function isIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name) && !RESERVED_KEYS.has(name);
}

/**
 * Check a table or field name
 * @param what - Noun used in the error message ("table", "field")
 */
export function ensureIdentifier(name: string, what: string = 'identifier'): string {
  if (!isIdentifier(name)) {
    throw new ValidationError(`Invalid ${what} name: ${JSON.stringify(name)}`);
  }
  return name;
}
