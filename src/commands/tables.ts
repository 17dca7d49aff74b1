/**
 * Table commands: create-table, drop-table, list-tables, describe
 */

import { Command } from 'commander';
import { parseColumnSpec } from '../schema/table-schema.js';
import { output, outputSuccess, formatSchema, renderDescription, renderTableList } from '../utils/output.js';
import { withDatabase, type GetGlobals } from './common.js';

export function createCreateTableCommand(getGlobals: GetGlobals): Command {
  return new Command('create-table')
    .description('Create a table')
    .argument('<table>', 'Table name')
    .argument('<columns...>', 'Columns as field:type (int, float, str, bool)')
    .action(async (table: string, columns: string[]) => {
      await withDatabase(getGlobals, async (db) => {
        const created = await db.createTable(table, columns.map(parseColumnSpec));
        outputSuccess(`Created table '${created.table}' (${formatSchema(created.schema)})`, created);
      });
    });
}

export function createDropTableCommand(getGlobals: GetGlobals): Command {
  return new Command('drop-table')
    .description('Drop a table and all its rows')
    .argument('<table>', 'Table name')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (table: string, options: { yes?: boolean }) => {
      await withDatabase(getGlobals, async (db) => {
        await db.dropTable(table, { assumeYes: options.yes });
        outputSuccess(`Dropped table '${table}'`);
      });
    });
}

export function createListTablesCommand(getGlobals: GetGlobals): Command {
  return new Command('list-tables').description('List tables and their columns').action(async () => {
    await withDatabase(getGlobals, async (db) => {
      const tables = await db.listTables();
      output(tables, renderTableList(tables).join('\n'));
    });
  });
}

export function createDescribeCommand(getGlobals: GetGlobals): Command {
  return new Command('describe')
    .description('Show columns, last id and row count of a table')
    .argument('<table>', 'Table name')
    .action(async (table: string) => {
      await withDatabase(getGlobals, async (db) => {
        const info = await db.describeTable(table);
        output(info, renderDescription(info).join('\n'));
      });
    });
}
