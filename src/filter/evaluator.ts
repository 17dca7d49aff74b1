/**
 * Where evaluation
 *
 * Comparison rules shared by both grammars:
 *   - `=` / `!=` are strict equality of JSON scalars (null = null is true)
 *   - ordering is false when either side is null or the types differ;
 *     numbers compare numerically, strings by code point, false < true
 */

import type { Row, ScalarValue } from '../types/index.js';
import type { ComparisonOperator, PreparedCondition, WhereNode } from './types.js';
import { ValidationError, WhereError } from '../errors/index.js';

/** Field value, absent fields read as null */
function fieldValue(row: Row, field: string): ScalarValue {
  return Object.hasOwn(row, field) ? row[field] : null;
}

export function compareValues(
  left: ScalarValue,
  operator: ComparisonOperator,
  right: ScalarValue
): boolean {
  switch (operator) {
    case '=':
      return left === right;
    case '!=':
      return left !== right;
    case '>':
    case '<':
    case '>=':
    case '<=':
      return compareOrdered(left, operator, right);
    default:
      throw new ValidationError(`Unsupported operator: '${String(operator)}'`);
  }
}

function compareOrdered(
  left: ScalarValue,
  operator: '>' | '<' | '>=' | '<=',
  right: ScalarValue
): boolean {
  if (left === null || right === null || typeof left !== typeof right) {
    return false;
  }

  if (typeof left === 'string' && typeof right === 'string') {
    return ordered(compareCodePoints(left, right), operator);
  }
  return ordered(Number(left) - Number(right), operator);
}

/** Unlike `<`, orders characters above U+FFFF after the BMP */
export function compareCodePoints(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    if (left[i] !== right[i]) {
      return (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    }
  }
  return left.length - right.length;
}

function ordered(diff: number, operator: '>' | '<' | '>=' | '<='): boolean {
  switch (operator) {
    case '>':
      return diff > 0;
    case '<':
      return diff < 0;
    case '>=':
      return diff >= 0;
    case '<=':
      return diff <= 0;
  }
}

/**
 * Strict grammar: every prepared condition must hold (AND)
 */
export function matchesConditions(row: Row, conditions: readonly PreparedCondition[]): boolean {
  for (const cond of conditions) {
    if (!compareValues(fieldValue(row, cond.field), cond.operator, cond.value)) {
      return false;
    }
  }
  return true;
}

/** null, false, 0 and '' are falsy */
export function isTruthy(value: ScalarValue): boolean {
  return value !== null && value !== false && value !== 0 && value !== '';
}

/**
 * Evaluate an expression tree against one record.
 * `and` / `or` return the deciding operand, as in short-circuit logic.
 */
export function evaluateExpression(node: WhereNode, row: Row): ScalarValue {
  switch (node.kind) {
    case 'literal':
      return node.value;

    case 'name':
      return fieldValue(row, node.name);

    case 'compare': {
      let left = evaluateExpression(node.operands[0], row);
      for (let i = 0; i < node.operators.length; i++) {
        const right = evaluateExpression(node.operands[i + 1], row);
        if (!compareValues(left, node.operators[i], right)) {
          return false;
        }
        left = right;
      }
      return true;
    }

    case 'bool': {
      let result: ScalarValue = node.op === 'and';
      for (const operand of node.operands) {
        result = evaluateExpression(operand, row);
        if (node.op === 'and' ? !isTruthy(result) : isTruthy(result)) {
          return result;
        }
      }
      return result;
    }

    default: {
      const unknown: never = node;
      throw new WhereError(`Unsupported where node: ${JSON.stringify(unknown)}`);
    }
  }
}

export function matchesExpression(node: WhereNode, row: Row): boolean {
  return isTruthy(evaluateExpression(node, row));
}
