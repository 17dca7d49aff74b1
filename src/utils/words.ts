/**
 * Quote-aware text splitting shared by the command parser and the
 * strict where grammar
 */

import { ParseError } from '../errors/index.js';

export interface SplitOptions {
  /**
   * Keep quote characters in the returned words. Backslashes are then
   * kept verbatim too; they only stop an escaped quote from closing the
   * quoted segment.
   */
  keepQuotes?: boolean;
}

function isQuote(ch: string): ch is '"' | "'" {
  return ch === '"' || ch === "'";
}

/**
 * Split text into shell-style words
 *
 * @example
 * splitWords('insert users name="Ann Lee"')             // ['insert', 'users', 'name=Ann Lee']
 * splitWords('name="Ann Lee"', { keepQuotes: true })   // ['name="Ann Lee"']
 */
export function splitWords(text: string, options: SplitOptions = {}): string[] {
  const keepQuotes = options.keepQuotes ?? false;
  const words: string[] = [];
  let buf = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;
  let quoteStart = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quote !== null) {
      if (ch === quote) {
        quote = null;
        if (keepQuotes) buf += ch;
        continue;
      }
      if (ch === '\\' && quote === '"' && i + 1 < text.length) {
        const next = text[i + 1];
        if (next === '"' || next === '\\') {
          buf += keepQuotes ? ch + next : next;
          i++;
          continue;
        }
      }
      buf += ch;
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) {
        words.push(buf);
        buf = '';
        inWord = false;
      }
      continue;
    }

    inWord = true;

    if (isQuote(ch)) {
      quote = ch;
      quoteStart = i;
      if (keepQuotes) buf += ch;
      continue;
    }

    if (ch === '\\' && !keepQuotes && i + 1 < text.length) {
      buf += text[i + 1];
      i++;
      continue;
    }

    buf += ch;
  }

  if (quote !== null) {
    throw new ParseError(`Unterminated quote starting at char ${quoteStart + 1}`);
  }
  if (inWord) {
    words.push(buf);
  }
  return words;
}

/**
 * Split on a separator character, ignoring separators inside quotes.
 * Parts are trimmed and empty parts dropped.
 */
export function splitOutsideQuotes(text: string, sep: string = ','): string[] {
  const parts: string[] = [];
  let buf = '';
  let quote: string | null = null;

  for (const ch of text) {
    if (isQuote(ch)) {
      if (quote === null) {
        quote = ch;
      } else if (quote === ch) {
        quote = null;
      }
    }

    if (ch === sep && quote === null) {
      const part = buf.trim();
      if (part) parts.push(part);
      buf = '';
      continue;
    }
    buf += ch;
  }

  const tail = buf.trim();
  if (tail) parts.push(tail);
  return parts;
}

/**
 * Find a whitespace-delimited keyword (case-insensitive) outside quotes
 * and split the text around its first occurrence
 */
export function splitAtKeyword(
  text: string,
  keyword: string
): { before: string; after: string } | null {
  const lower = keyword.toLowerCase();
  let quote: string | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote !== null) {
      if (ch === quote) quote = null;
      continue;
    }
    if (isQuote(ch)) {
      quote = ch;
      continue;
    }

    const atBoundary = i === 0 || /\s/.test(text[i - 1]);
    if (!atBoundary) continue;

    const end = i + keyword.length;
    if (text.slice(i, end).toLowerCase() !== lower) continue;
    if (end < text.length && !/\s/.test(text[end])) continue;

    return { before: text.slice(0, i).trim(), after: text.slice(end).trim() };
  }
  return null;
}
