/**
 * Expression grammar lexer
 *
 * Produces tokens for the allow-listed grammar plus `keyword` and
 * `symbol` tokens for everything else that looks like code, so the
 * parser can name the construct it rejects.
 */

import type { ScalarValue } from '../types/index.js';
import type { ComparisonOperator } from './types.js';
import { WhereError } from '../errors/index.js';

export type Token =
  | { kind: 'name'; name: string; pos: number }
  | { kind: 'literal'; value: ScalarValue; pos: number }
  | { kind: 'op'; operator: ComparisonOperator; pos: number }
  | { kind: 'and' | 'or' | 'lparen' | 'rparen' | 'eof'; pos: number }
  | { kind: 'keyword'; word: string; pos: number }
  | { kind: 'symbol'; symbol: string; pos: number };

/** Reserved words that are never field names */
const KEYWORDS: ReadonlySet<string> = new Set([
  'not', 'in', 'is', 'lambda', 'if', 'else', 'elif', 'for', 'while', 'import', 'from',
  'def', 'class', 'return', 'yield', 'await', 'async', 'del', 'global', 'nonlocal',
  'pass', 'raise', 'try', 'except', 'finally', 'with', 'as', 'assert', 'break', 'continue',
]);

/** Comparison spellings; a lone `=` means equality */
const COMPARISONS: ReadonlyArray<[string, ComparisonOperator]> = [
  ['==', '='],
  ['!=', '!='],
  ['>=', '>='],
  ['<=', '<='],
  ['=', '='],
  ['>', '>'],
  ['<', '<'],
];

/** Checked before comparisons so `<<` is not read as two `<` */
const MULTI_CHAR_SYMBOLS = [':=', '**', '//', '<<', '>>', '->'];

const SINGLE_CHAR_SYMBOLS = new Set([...'.[]{},:;+-*/%&|^~@!?$`#\\']);

const NAME_START = /[A-Za-z_]/;
const NAME_CHAR = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const previousIsOperand = (): boolean => {
    const prev = tokens[tokens.length - 1];
    return prev !== undefined && (prev.kind === 'name' || prev.kind === 'literal' || prev.kind === 'rparen');
  };

  while (pos < input.length) {
    const ch = input[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (ch === '(') {
      tokens.push({ kind: 'lparen', pos });
      pos++;
      continue;
    }
    if (ch === ')') {
      tokens.push({ kind: 'rparen', pos });
      pos++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const str = readString(input, pos, ch);
      tokens.push({ kind: 'literal', value: str.value, pos });
      pos = str.end;
      continue;
    }

    // A sign directly before a digit is part of the number unless it follows an operand
    const signedNumber = (ch === '-' || ch === '+') && DIGIT.test(input[pos + 1] ?? '') && !previousIsOperand();
    if (DIGIT.test(ch) || signedNumber) {
      const num = readNumber(input, pos);
      tokens.push({ kind: 'literal', value: num.value, pos });
      pos = num.end;
      continue;
    }

    if (NAME_START.test(ch)) {
      let end = pos + 1;
      while (end < input.length && NAME_CHAR.test(input[end])) end++;
      tokens.push(wordToken(input.slice(pos, end), pos));
      pos = end;
      continue;
    }

    const multi = MULTI_CHAR_SYMBOLS.find((s) => input.startsWith(s, pos));
    if (multi) {
      tokens.push({ kind: 'symbol', symbol: multi, pos });
      pos += multi.length;
      continue;
    }

    const cmp = COMPARISONS.find(([text]) => input.startsWith(text, pos));
    if (cmp) {
      tokens.push({ kind: 'op', operator: cmp[1], pos });
      pos += cmp[0].length;
      continue;
    }

    if (SINGLE_CHAR_SYMBOLS.has(ch)) {
      tokens.push({ kind: 'symbol', symbol: ch, pos });
      pos++;
      continue;
    }

    throw new WhereError(`Unexpected character '${ch}' at char ${pos + 1}`, pos);
  }

  tokens.push({ kind: 'eof', pos });
  return tokens;
}

function wordToken(word: string, pos: number): Token {
  const lower = word.toLowerCase();
  switch (lower) {
    case 'and':
    case 'or':
      return { kind: lower, pos };
    case 'true':
      return { kind: 'literal', value: true, pos };
    case 'false':
      return { kind: 'literal', value: false, pos };
    case 'null':
    case 'none':
      return { kind: 'literal', value: null, pos };
  }
  if (KEYWORDS.has(lower)) {
    return { kind: 'keyword', word, pos };
  }
  return { kind: 'name', name: word, pos };
}

/** Quoted string; `\` escapes the quote character and itself */
function readString(input: string, start: number, quote: string): { value: string; end: number } {
  let pos = start + 1;
  let value = '';

  while (pos < input.length) {
    const ch = input[pos];
    if (ch === quote) {
      return { value, end: pos + 1 };
    }
    if (ch === '\\' && pos + 1 < input.length) {
      const next = input[pos + 1];
      if (next === quote || next === '\\') {
        value += next;
        pos += 2;
        continue;
      }
    }
    value += ch;
    pos++;
  }

  throw new WhereError(`Unterminated string starting at char ${start + 1}`, start);
}

/** Integer or decimal with optional exponent and sign */
function readNumber(input: string, start: number): { value: number; end: number } {
  let pos = start;
  if (input[pos] === '-' || input[pos] === '+') pos++;
  while (pos < input.length && DIGIT.test(input[pos])) pos++;

  if (input[pos] === '.' && DIGIT.test(input[pos + 1] ?? '')) {
    pos++;
    while (pos < input.length && DIGIT.test(input[pos])) pos++;
  }

  if (input[pos] === 'e' || input[pos] === 'E') {
    let expEnd = pos + 1;
    if (input[expEnd] === '+' || input[expEnd] === '-') expEnd++;
    if (DIGIT.test(input[expEnd] ?? '')) {
      pos = expEnd;
      while (pos < input.length && DIGIT.test(input[pos])) pos++;
    }
  }

  if (pos < input.length && NAME_CHAR.test(input[pos])) {
    throw new WhereError(`Invalid number '${input.slice(start, pos + 1)}' at char ${start + 1}`, start);
  }

  const value = Number(input.slice(start, pos));
  if (!Number.isFinite(value)) {
    throw new WhereError(`Invalid number '${input.slice(start, pos)}' at char ${start + 1}`, start);
  }
  return { value, end: pos };
}
