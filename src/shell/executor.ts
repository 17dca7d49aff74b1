/**
 * Runs parsed commands against the engine and renders their results
 */

import type { TableOperations } from '../engine/index.js';
import type { ExecutionResult, ShellCommand } from './types.js';
import { USAGE, getAllCommands } from './types.js';
import { parseCommand } from './command-parser.js';
import { isDbError } from '../errors/index.js';
import { formatCount, formatSchema, renderDescription, renderRows, renderTableList } from '../utils/output.js';
import { logger } from '../utils/logger.js';

export function helpLines(topic?: string): string[] {
  if (topic) {
    const key = topic === 'quit' ? 'exit' : topic;
    const usage = USAGE[key];
    return usage ? [`Usage: ${usage}`] : [`No help for '${topic}'`];
  }
  return [
    'Commands:',
    ...getAllCommands()
      .filter((name) => name !== 'quit')
      .map((name) => `  ${USAGE[name]}`),
    '',
    'Types: int float str bool. Unquoted null/none is null for any type.',
    'Bulk update/delete (no where) and drop_table may ask for confirmation; add --yes to skip.',
  ];
}

export interface ExecutorOptions {
  /** Print stacks of unexpected errors */
  verbose?: boolean;
}

export class CommandExecutor {
  constructor(
    private readonly engine: TableOperations,
    private readonly options: ExecutorOptions = {}
  ) {}

  /**
   * Parse and run one line. Errors become output lines; this never throws.
   */
  async run(line: string): Promise<ExecutionResult> {
    try {
      const command = parseCommand(line);
      if (!command) {
        return { ok: true, lines: [] };
      }
      return { ok: true, ...(await this.execute(command)) };
    } catch (error) {
      return { ok: false, lines: this.errorLines(error) };
    }
  }

  async execute(command: ShellCommand): Promise<Omit<ExecutionResult, 'ok'>> {
    switch (command.name) {
      case 'create_table': {
        const created = await this.engine.createTable(command.table, command.columns);
        return { lines: [`Created table '${created.table}' (${formatSchema(created.schema)})`] };
      }

      case 'drop_table':
        await this.engine.dropTable(command.table, { assumeYes: command.assumeYes });
        return { lines: [`Dropped table '${command.table}'`] };

      case 'list_tables':
        return { lines: renderTableList(await this.engine.listTables()) };

      case 'describe':
        return { lines: renderDescription(await this.engine.describeTable(command.table)) };

      case 'insert': {
        const row = await this.engine.insert(command.table, command.values);
        return { lines: [`Inserted row with id ${String(row.id)}`] };
      }

      case 'select': {
        const result = await this.engine.select(command.table, command.where);
        return { lines: renderRows(result.rows, result.fromCache) };
      }

      case 'update': {
        const count = await this.engine.update(command.table, command.set, command.where, {
          assumeYes: command.assumeYes,
        });
        return { lines: [formatCount('Updated', count)] };
      }

      case 'delete': {
        const count = await this.engine.delete(command.table, command.where, { assumeYes: command.assumeYes });
        return { lines: [formatCount('Deleted', count)] };
      }

      case 'help':
        return { lines: helpLines(command.topic) };

      case 'clear':
        return { lines: [], clear: true };

      case 'exit':
        return { lines: [], exit: true };
    }
  }

  private errorLines(error: unknown): string[] {
    if (isDbError(error)) {
      return [`Error: ${error.message}`];
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Unexpected failure: ${message}`, 'shell');
    const lines = [`Error: Unexpected error: ${message}`];
    if (this.options.verbose && error instanceof Error && error.stack) {
      lines.push(error.stack);
    }
    return lines;
  }
}
