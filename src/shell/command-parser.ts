/**
 * Command language parser
 *
 *   create_table <table> <field:type> ...
 *   drop_table <table>
 *   list_tables
 *   describe <table>
 *   insert <table> <field=value> ...
 *   select <table> [where <condition>]
 *   update <table> set <field=value>[, ...] [where <condition>]
 *   delete <table> [where <condition>]
 *   help | clear | exit | quit
 *
 * A trailing `--yes` / `-y` confirms bulk writes.
 */

import type { RawValues } from '../types/index.js';
import type { ShellCommand } from './types.js';
import { USAGE } from './types.js';
import { ParseError } from '../errors/index.js';
import { parseColumnSpec } from '../schema/table-schema.js';
import { splitAtKeyword, splitOutsideQuotes, splitWords } from '../utils/words.js';

const YES_FLAG = /\s+(--yes|-y)$/i;

function usage(command: string): ParseError {
  return new ParseError(`Usage: ${USAGE[command]}`);
}

/** Strip a trailing --yes flag */
function takeYesFlag(text: string): { text: string; assumeYes: boolean } {
  const padded = ` ${text}`;
  const match = YES_FLAG.exec(padded);
  if (!match) {
    return { text, assumeYes: false };
  }
  return { text: padded.slice(0, match.index).trim(), assumeYes: true };
}

/**
 * Split `field=value` at the first `=`. The value keeps its quotes so
 * coercion can tell `"null"` from `null`.
 */
export function parseAssignment(text: string): [field: string, value: string] {
  const sep = text.indexOf('=');
  if (sep <= 0) {
    throw new ParseError(`Expected <field=value>, got: ${JSON.stringify(text)}`);
  }
  return [text.slice(0, sep).trim(), text.slice(sep + 1).trim()];
}

/** `field=value` pairs; a field may appear once */
export function parseAssignments(parts: readonly string[]): RawValues {
  const pairs = parts.map(parseAssignment);
  const seen = new Set<string>();
  for (const [field] of pairs) {
    if (seen.has(field)) {
      throw new ParseError(`Duplicate field: '${field}'`);
    }
    seen.add(field);
  }
  // fromEntries defines own keys, so no field name is lost to a setter
  return Object.fromEntries(pairs);
}

/** A single table name, nothing after it */
function singleTable(text: string, command: string): string {
  const words = splitWords(text);
  if (words.length !== 1) {
    throw usage(command);
  }
  return words[0];
}

/** `<table> [where <condition>]` */
function tableAndWhere(text: string, command: string): { table: string; where?: string } {
  const split = splitAtKeyword(text, 'where');
  if (!split) {
    return { table: singleTable(text, command) };
  }
  if (!split.after) {
    throw new ParseError('Empty where-clause');
  }
  return { table: singleTable(split.before, command), where: split.after };
}

/**
 * Parse one line of the command language
 * @returns null for a blank line
 */
export function parseCommand(line: string): ShellCommand | null {
  const trimmed = line.trim();
  if (!trimmed) {
    return null;
  }

  const match = /^(\S+)\s*([\s\S]*)$/.exec(trimmed);
  const word = (match?.[1] ?? trimmed).toLowerCase();
  const rest = match?.[2] ?? '';

  switch (word) {
    case 'create_table': {
      const [table, ...specs] = splitWords(rest);
      if (!table) throw usage(word);
      return { name: 'create_table', table, columns: specs.map(parseColumnSpec) };
    }

    case 'drop_table': {
      const { text, assumeYes } = takeYesFlag(rest);
      return { name: 'drop_table', table: singleTable(text, word), assumeYes };
    }

    case 'list_tables':
      if (rest) throw usage(word);
      return { name: 'list_tables' };

    case 'describe':
      return { name: 'describe', table: singleTable(rest, word) };

    case 'insert': {
      const [table, ...pairs] = splitWords(rest, { keepQuotes: true });
      if (!table || pairs.length === 0) throw usage(word);
      return { name: 'insert', table, values: parseAssignments(pairs) };
    }

    case 'select':
      return { name: 'select', ...tableAndWhere(rest, word) };

    case 'update': {
      const { text, assumeYes } = takeYesFlag(rest);
      const setSplit = splitAtKeyword(text, 'set');
      if (!setSplit) {
        throw new ParseError('update requires set');
      }
      const table = singleTable(setSplit.before, word);
      const whereSplit = splitAtKeyword(setSplit.after, 'where');
      const setText = whereSplit ? whereSplit.before : setSplit.after;
      const parts = splitOutsideQuotes(setText, ',');
      if (parts.length === 0) {
        throw new ParseError('update requires set');
      }
      if (whereSplit && !whereSplit.after) {
        throw new ParseError('Empty where-clause');
      }
      return {
        name: 'update',
        table,
        set: parseAssignments(parts),
        where: whereSplit?.after,
        assumeYes,
      };
    }

    case 'delete': {
      const { text, assumeYes } = takeYesFlag(rest);
      return { name: 'delete', ...tableAndWhere(text, word), assumeYes };
    }

    case 'help':
      return rest ? { name: 'help', topic: rest.split(/\s+/)[0].toLowerCase() } : { name: 'help' };

    case 'clear':
      return { name: 'clear' };

    case 'exit':
    case 'quit':
      return { name: 'exit' };

    default:
      throw new ParseError(`Unknown command: '${word}'. Type "help" for available commands`);
  }
}
