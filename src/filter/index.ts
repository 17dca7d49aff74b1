/**
 * Where-clause parsing, compilation and evaluation
 */

// Types
export type {
  ComparisonOperator,
  CompiledWhere,
  Condition,
  ExpressionParseResult,
  FieldTypes,
  PreparedCondition,
  WhereNode,
} from './types.js';

// Strict grammar
export { parseConditions, parseComparison, prepareConditions } from './conditions.js';

// Expression grammar
export { tokenize, type Token } from './lexer.js';
export { parseExpression } from './parser.js';

// Evaluator
export {
  compareValues,
  evaluateExpression,
  isTruthy,
  matchesConditions,
  matchesExpression,
} from './evaluator.js';

// Compiler
export {
  MATCH_ALL,
  compileConditions,
  compileExpression,
  compileWhere,
  conditionsToExpression,
  formatConditions,
  signatureOf,
  type WhereInput,
} from './compiler.js';
