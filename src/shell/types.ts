/**
 * Shell types and command vocabulary
 */

import type { ColumnSpec, RawValues } from '../types/index.js';

/**
 * One parsed line of the command language. Where-clauses stay as text;
 * the engine compiles them with the configured grammar.
 */
export type ShellCommand =
  | { name: 'create_table'; table: string; columns: ColumnSpec[] }
  | { name: 'drop_table'; table: string; assumeYes: boolean }
  | { name: 'list_tables' }
  | { name: 'describe'; table: string }
  | { name: 'insert'; table: string; values: RawValues }
  | { name: 'select'; table: string; where?: string }
  | { name: 'update'; table: string; set: RawValues; where?: string; assumeYes: boolean }
  | { name: 'delete'; table: string; where?: string; assumeYes: boolean }
  | { name: 'help'; topic?: string }
  | { name: 'clear' }
  | { name: 'exit' };

export type ShellCommandName = ShellCommand['name'];

/**
 * What a command printed and whether the shell should stop
 */
export interface ExecutionResult {
  ok: boolean;
  lines: string[];
  exit?: boolean;
  clear?: boolean;
}

/** Commands that take a table name as first argument */
export const TABLE_COMMANDS = ['drop_table', 'describe', 'insert', 'select', 'update', 'delete'];

export const DATA_COMMANDS = ['create_table', ...TABLE_COMMANDS, 'list_tables'];

export const SHELL_BUILTINS = ['help', 'clear', 'exit', 'quit'];

/** Keywords offered after the table name */
export const COMMAND_KEYWORDS: Record<string, string[]> = {
  select: ['where'],
  update: ['set', 'where'],
  delete: ['where'],
};

export const USAGE: Record<string, string> = {
  create_table: 'create_table <table> <field:type> ...',
  drop_table: 'drop_table <table> [--yes]',
  list_tables: 'list_tables',
  describe: 'describe <table>',
  insert: 'insert <table> <field=value> ...',
  select: 'select <table> [where <condition>]',
  update: 'update <table> set <field=value>[, <field=value>...] [where <condition>] [--yes]',
  delete: 'delete <table> [where <condition>] [--yes]',
  help: 'help [command]',
  clear: 'clear',
  exit: 'exit | quit',
};

export function getAllCommands(): string[] {
  return [...DATA_COMMANDS, ...SHELL_BUILTINS];
}
