/**
 * Where compilation: text or parsed conditions -> CompiledWhere
 */

import type { WhereGrammar } from '../types/index.js';
import type { CompiledWhere, Condition, FieldTypes, PreparedCondition, WhereNode } from './types.js';
import { WhereError } from '../errors/index.js';
import { parseConditions, prepareConditions } from './conditions.js';
import { parseExpression } from './parser.js';
import { matchesConditions, matchesExpression } from './evaluator.js';

/** A where-clause given as text, as parsed strict conditions, or absent */
export type WhereInput = string | readonly Condition[] | undefined;

export const MATCH_ALL: CompiledWhere = {
  source: '',
  signature: '',
  predicate: () => true,
};

/**
 * The strict conjunction as an expression tree. Only used for its
 * canonical form; evaluation goes through matchesConditions.
 */
export function conditionsToExpression(conditions: readonly PreparedCondition[]): WhereNode | null {
  const comparisons: WhereNode[] = conditions.map((c) => ({
    kind: 'compare',
    operands: [
      { kind: 'name', name: c.field },
      { kind: 'literal', value: c.value },
    ],
    operators: [c.operator],
  }));

  if (comparisons.length === 0) return null;
  if (comparisons.length === 1) return comparisons[0];
  return { kind: 'bool', op: 'and', operands: comparisons };
}

export function signatureOf(node: WhereNode | null): string {
  return node === null ? '' : JSON.stringify(node);
}

/**
 * Compile an expression-grammar where-clause
 * @throws WhereError when the text is outside the grammar
 */
export function compileExpression(source: string): CompiledWhere {
  if (!source.trim()) {
    return MATCH_ALL;
  }

  const result = parseExpression(source);
  if (!result.ok) {
    throw new WhereError(result.error, result.position);
  }

  const ast = result.ast;
  return {
    source,
    signature: signatureOf(ast),
    predicate: (row) => matchesExpression(ast, row),
  };
}

/**
 * Compile strict-grammar conditions against a table's field types
 */
export function compileConditions(
  source: string,
  conditions: readonly Condition[],
  fields: FieldTypes
): CompiledWhere {
  const prepared = prepareConditions(conditions, fields);
  if (prepared.length === 0) {
    return MATCH_ALL;
  }
  return {
    source,
    signature: signatureOf(conditionsToExpression(prepared)),
    predicate: (row) => matchesConditions(row, prepared),
  };
}

/**
 * Compile whatever the command layer produced, using the configured grammar
 * for text input. Pre-parsed conditions are always strict-grammar.
 */
export function compileWhere(where: WhereInput, grammar: WhereGrammar, fields: FieldTypes): CompiledWhere {
  if (where === undefined) {
    return MATCH_ALL;
  }
  if (typeof where !== 'string') {
    return compileConditions(formatConditions(where), where, fields);
  }
  if (grammar === 'expression') {
    return compileExpression(where);
  }
  return compileConditions(where, parseConditions(where), fields);
}

/** `age>=30 and name="Alice"` */
export function formatConditions(conditions: readonly Condition[]): string {
  return conditions.map((c) => `${c.field}${c.operator}${c.rawValue}`).join(' and ');
}
