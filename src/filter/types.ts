/**
 * Where-clause types
 *
 * Two front ends produce the same CompiledWhere:
 *   strict:     `age>=30 and name="Alice"` -> Condition[] (AND only)
 *   expression: `(age >= 30 or admin = true) and name != null` -> WhereNode tree
 */

import type { Row, ScalarValue, TypeName } from '../types/index.js';

/** Comparison operators, equality spelled `=` */
export type ComparisonOperator = '=' | '!=' | '>' | '<' | '>=' | '<=';

/** One parsed comparison with its value still raw */
export interface Condition {
  field: string;
  operator: ComparisonOperator;
  rawValue: string;
}

/** A comparison whose value was coerced to the field's declared type */
export interface PreparedCondition {
  field: string;
  operator: ComparisonOperator;
  value: ScalarValue;
}

/**
 * Expression tree. These four node kinds are the whole grammar; the
 * parser has no way to build anything else.
 */
export type WhereNode =
  | { kind: 'bool'; op: 'and' | 'or'; operands: WhereNode[] }
  /** `a < b <= c` chains: operators.length === operands.length - 1 */
  | { kind: 'compare'; operands: WhereNode[]; operators: ComparisonOperator[] }
  | { kind: 'name'; name: string }
  | { kind: 'literal'; value: ScalarValue };

/** Expression parser result */
export type ExpressionParseResult =
  | { ok: true; ast: WhereNode }
  | { ok: false; error: string; position?: number };

/** Field type lookup used to coerce strict-grammar values */
export interface FieldTypes {
  typeOf(field: string): TypeName | undefined;
}

/** A where-clause ready to run against rows */
export interface CompiledWhere {
  /** Text the user typed ('' when absent) */
  source: string;
  /** Canonical form used as the select cache key */
  signature: string;
  predicate: (row: Row) => boolean;
}
