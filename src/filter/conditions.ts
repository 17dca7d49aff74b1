/**
 * Strict where grammar
 *
 * Grammar:
 *   where      = comparison ( 'and' comparison )*
 *   comparison = field operator value
 *   operator   = '>=' | '<=' | '!=' | '=' | '>' | '<'
 *
 * `or` is rejected. Values are kept raw here and coerced later against
 * the table schema (see prepareConditions).
 */

import type { ComparisonOperator, Condition, FieldTypes, PreparedCondition } from './types.js';
import { ParseError, ValidationError } from '../errors/index.js';
import { coerce } from '../coerce/scalar.js';
import { ensureIdentifier } from '../schema/identifier.js';
import { splitWords } from '../utils/words.js';

/** Longest first: `>=` must win over `>` at the same position */
const OPERATORS: ComparisonOperator[] = ['>=', '<=', '!=', '=', '>', '<'];

/**
 * Parse a strict where-clause into raw conditions
 * @returns empty array for empty input
 */
export function parseConditions(input: string): Condition[] {
  const trimmed = input.trim();
  if (!trimmed) {
    return [];
  }

  const tokens = splitWords(trimmed, { keepQuotes: true });
  const phrases: string[] = [];
  let buf: string[] = [];

  for (const token of tokens) {
    const lower = token.toLowerCase();
    if (lower === 'and') {
      if (buf.length === 0) {
        throw new ParseError('Invalid where-clause: empty condition before AND');
      }
      phrases.push(buf.join(' '));
      buf = [];
    } else if (lower === 'or') {
      throw new ParseError('OR is not supported (use AND)');
    } else {
      buf.push(token);
    }
  }

  if (buf.length === 0) {
    throw new ParseError('Invalid where-clause: empty condition after AND');
  }
  phrases.push(buf.join(' '));

  return phrases.map(parseComparison);
}

/**
 * Parse one comparison like `age>=30` or `name = "Alice"`
 */
export function parseComparison(phrase: string): Condition {
  const text = phrase.trim();
  const found = findOperator(text);
  if (!found) {
    throw new ParseError(`Cannot parse condition: ${JSON.stringify(text)}`);
  }

  const field = text.slice(0, found.index).trim();
  const rawValue = text.slice(found.index + found.operator.length).trim();

  ensureIdentifier(field, 'field');
  if (rawValue === '') {
    throw new ParseError(`Empty value in condition: ${JSON.stringify(text)}`);
  }

  return { field, operator: found.operator, rawValue };
}

/** First operator outside quotes, longest match at that position */
function findOperator(text: string): { index: number; operator: ComparisonOperator } | null {
  let quote: string | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote !== null) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      continue;
    }
    for (const op of OPERATORS) {
      if (text.startsWith(op, i)) {
        return { index: i, operator: op };
      }
    }
  }
  return null;
}

/**
 * Coerce each condition's raw value with the field's declared type
 * (`id` is int). Unknown fields are rejected here, not at parse time.
 */
export function prepareConditions(
  conditions: readonly Condition[],
  fields: FieldTypes
): PreparedCondition[] {
  return conditions.map((cond) => {
    const typeName = fields.typeOf(cond.field);
    if (typeName === undefined) {
      throw new ValidationError(`Unknown field in where: '${cond.field}'`);
    }
    return {
      field: cond.field,
      operator: cond.operator,
      value: coerce(cond.rawValue, typeName),
    };
  });
}
