/**
 * Row commands: insert, select, update, delete
 *
 * Values follow the shell's literal rules: quotes keep text as text, so
 * `name='"null"'` stores the string and `name=null` stores null.
 */

import { Command } from 'commander';
import { parseAssignments } from '../shell/command-parser.js';
import { splitOutsideQuotes } from '../utils/words.js';
import { output, outputSuccess, formatCount, renderRows } from '../utils/output.js';
import { withDatabase, type GetGlobals } from './common.js';

interface WhereOptions {
  where?: string;
}

interface BulkOptions extends WhereOptions {
  yes?: boolean;
}

export function createInsertCommand(getGlobals: GetGlobals): Command {
  return new Command('insert')
    .description('Insert a row')
    .argument('<table>', 'Table name')
    .argument('<pairs...>', 'Values as field=value')
    .action(async (table: string, pairs: string[]) => {
      await withDatabase(getGlobals, async (db) => {
        const row = await db.insert(table, parseAssignments(pairs));
        outputSuccess(`Inserted row with id ${String(row.id)}`, row);
      });
    });
}

export function createSelectCommand(getGlobals: GetGlobals): Command {
  return new Command('select')
    .description('Print matching rows')
    .argument('<table>', 'Table name')
    .option('-w, --where <condition>', 'Filter, e.g. "age >= 30 and name = \\"Ann\\""')
    .action(async (table: string, options: WhereOptions) => {
      await withDatabase(getGlobals, async (db) => {
        const result = await db.select(table, options.where);
        output(result.rows, renderRows(result.rows, result.fromCache).join('\n'));
      });
    });
}

export function createUpdateCommand(getGlobals: GetGlobals): Command {
  return new Command('update')
    .description('Update matching rows (all rows without --where)')
    .argument('<table>', 'Table name')
    .requiredOption('-s, --set <pairs>', 'Comma-separated field=value pairs')
    .option('-w, --where <condition>', 'Filter')
    .option('-y, --yes', 'Do not ask before updating every row')
    .action(async (table: string, options: BulkOptions & { set: string }) => {
      await withDatabase(getGlobals, async (db) => {
        const set = parseAssignments(splitOutsideQuotes(options.set, ','));
        const count = await db.update(table, set, options.where, { assumeYes: options.yes });
        output({ updated: count }, formatCount('Updated', count));
      });
    });
}

export function createDeleteCommand(getGlobals: GetGlobals): Command {
  return new Command('delete')
    .description('Delete matching rows (all rows without --where)')
    .argument('<table>', 'Table name')
    .option('-w, --where <condition>', 'Filter')
    .option('-y, --yes', 'Do not ask before deleting every row')
    .action(async (table: string, options: BulkOptions) => {
      await withDatabase(getGlobals, async (db) => {
        const count = await db.delete(table, options.where, { assumeYes: options.yes });
        output({ deleted: count }, formatCount('Deleted', count));
      });
    });
}
