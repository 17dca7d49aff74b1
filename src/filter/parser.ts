/**
 * Expression grammar parser
 *
 * Grammar:
 *   expr     = or
 *   or       = and ( 'or' and )*
 *   and      = cmp ( 'and' cmp )*
 *   cmp      = operand ( cmpop operand )*
 *   operand  = name | number | string | true | false | null | '(' expr ')'
 *   cmpop    = '==' | '=' | '!=' | '>' | '<' | '>=' | '<='
 *
 * Names are field references, resolved against the record at evaluation
 * time. Anything outside this grammar (calls, attribute access,
 * subscripts, arithmetic, assignment, `not`, `in`, ...) is rejected
 * while the tree is built, so nothing outside it ever reaches the
 * evaluator.
 */

import type { ComparisonOperator, ExpressionParseResult, WhereNode } from './types.js';
import { tokenize, type Token } from './lexer.js';
import { WhereError } from '../errors/index.js';

/** Names for rejected symbols in error messages */
const SYMBOL_CONSTRUCTS: Record<string, string> = {
  '+': 'Arithmetic',
  '-': 'Arithmetic',
  '*': 'Arithmetic',
  '/': 'Arithmetic',
  '%': 'Arithmetic',
  '**': 'Arithmetic',
  '//': 'Arithmetic',
  '@': 'Arithmetic',
  '&': 'Bitwise operators',
  '|': 'Bitwise operators',
  '^': 'Bitwise operators',
  '~': 'Bitwise operators',
  '<<': 'Bitwise operators',
  '>>': 'Bitwise operators',
  ':=': 'Assignment',
  '.': 'Attribute access',
  '[': 'Subscripts and lists',
  ']': 'Subscripts and lists',
  '{': 'Dict and set literals',
  '}': 'Dict and set literals',
  ',': 'Tuples and argument lists',
  ':': 'Slices and lambdas',
  ';': 'Multiple statements',
  '->': 'Annotations',
};

/**
 * Parse an expression into a where tree
 */
export function parseExpression(input: string): ExpressionParseResult {
  try {
    const parser = new ExpressionParser(tokenize(input));
    return { ok: true, ast: parser.parse() };
  } catch (error) {
    if (error instanceof WhereError) {
      return { ok: false, error: error.message, position: error.position };
    }
    throw error;
  }
}

class ExpressionParser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): WhereNode {
    const node = this.parseOr();
    const tok = this.peek();
    if (tok.kind !== 'eof') {
      throw this.unexpected(tok);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private next(): Token {
    const tok = this.peek();
    if (tok.kind !== 'eof') this.index++;
    return tok;
  }

  private parseOr(): WhereNode {
    const operands = [this.parseAnd()];
    while (this.peek().kind === 'or') {
      this.next();
      operands.push(this.parseAnd());
    }
    return operands.length === 1 ? operands[0] : { kind: 'bool', op: 'or', operands };
  }

  private parseAnd(): WhereNode {
    const operands = [this.parseComparison()];
    while (this.peek().kind === 'and') {
      this.next();
      operands.push(this.parseComparison());
    }
    return operands.length === 1 ? operands[0] : { kind: 'bool', op: 'and', operands };
  }

  private parseComparison(): WhereNode {
    const first = this.parseOperand();
    const operands: WhereNode[] = [first];
    const operators: ComparisonOperator[] = [];

    let tok = this.peek();
    while (tok.kind === 'op') {
      this.next();
      operators.push(tok.operator);
      operands.push(this.parseOperand());
      tok = this.peek();
    }

    return operators.length === 0 ? first : { kind: 'compare', operands, operators };
  }

  private parseOperand(): WhereNode {
    const tok = this.next();
    let node: WhereNode;

    switch (tok.kind) {
      case 'name':
        node = { kind: 'name', name: tok.name };
        break;
      case 'literal':
        node = { kind: 'literal', value: tok.value };
        break;
      case 'lparen': {
        node = this.parseOr();
        const close = this.next();
        if (close.kind !== 'rparen') {
          throw close.kind === 'eof'
            ? new WhereError(`Missing ')' for '(' at char ${tok.pos + 1}`, tok.pos)
            : this.unexpected(close);
        }
        break;
      }
      case 'keyword':
      case 'symbol':
        throw this.unexpected(tok);
      default:
        throw new WhereError(`Expected a field name or value at char ${tok.pos + 1}`, tok.pos);
    }

    this.rejectPostfix();
    return node;
  }

  /** Calls, attribute access and subscripts all start right after an operand */
  private rejectPostfix(): void {
    const tok = this.peek();
    if (tok.kind === 'lparen') {
      throw new WhereError(`Function calls not allowed in where (at char ${tok.pos + 1})`, tok.pos);
    }
    if (tok.kind === 'symbol' && tok.symbol === '.') {
      throw new WhereError(`Attribute access not allowed in where (at char ${tok.pos + 1})`, tok.pos);
    }
    if (tok.kind === 'symbol' && tok.symbol === '[') {
      throw new WhereError(`Subscripts not allowed in where (at char ${tok.pos + 1})`, tok.pos);
    }
  }

  private unexpected(tok: Token): WhereError {
    const at = `at char ${tok.pos + 1}`;
    switch (tok.kind) {
      case 'keyword':
        return new WhereError(`'${tok.word}' is not allowed in where (${at})`, tok.pos);
      case 'symbol': {
        const construct = SYMBOL_CONSTRUCTS[tok.symbol];
        return construct
          ? new WhereError(`${construct} not allowed in where (${at})`, tok.pos)
          : new WhereError(`Unexpected '${tok.symbol}' ${at}`, tok.pos);
      }
      case 'name':
        return new WhereError(`Unexpected name '${tok.name}' ${at}`, tok.pos);
      case 'literal':
        return new WhereError(`Unexpected value ${JSON.stringify(tok.value)} ${at}`, tok.pos);
      case 'rparen':
        return new WhereError(`Unexpected ')' ${at}`, tok.pos);
      default:
        return new WhereError(`Unexpected token ${at}`, tok.pos);
    }
  }
}
