/**
 * Logging and timing around a TableOperations implementation
 */

import { performance } from 'perf_hooks';
import type { ColumnSpec, RawValues, Row } from '../types/index.js';
import type { SelectResult, TableDescription, TableOperations, TableSummary, WriteOptions } from './types.js';
import { formatConditions, type WhereInput } from '../filter/index.js';
import type { CommandLog, CommandLogEntry } from './command-log.js';
import { logger } from '../utils/logger.js';

export interface InstrumentationOptions {
  /** Destination for JSONL entries; omit to disable the command log */
  log?: CommandLog;
  /** Called after every operation, successful or not */
  onTiming?: (op: string, ms: number) => void;
}

function whereArg(where: WhereInput): string | undefined {
  return where === undefined || typeof where === 'string' ? where : formatConditions(where);
}

export class InstrumentedEngine implements TableOperations {
  constructor(
    private readonly inner: TableOperations,
    private readonly options: InstrumentationOptions = {}
  ) {}

  createTable(name: string, columns: readonly ColumnSpec[]): Promise<TableDescription> {
    return this.run('create_table', { table: name, columns: columns.map(([f, t]) => `${f}:${t}`) }, () =>
      this.inner.createTable(name, columns)
    );
  }

  dropTable(name: string, options?: WriteOptions): Promise<void> {
    return this.run('drop_table', { table: name }, () => this.inner.dropTable(name, options));
  }

  listTables(): Promise<TableSummary[]> {
    return this.run('list_tables', {}, () => this.inner.listTables());
  }

  describeTable(name: string): Promise<TableDescription> {
    return this.run('describe', { table: name }, () => this.inner.describeTable(name));
  }

  insert(table: string, values: RawValues): Promise<Row> {
    return this.run('insert', { table, values }, () => this.inner.insert(table, values));
  }

  select(table: string, where?: WhereInput): Promise<SelectResult> {
    return this.run('select', { table, where: whereArg(where) }, () => this.inner.select(table, where));
  }

  update(table: string, set: RawValues, where?: WhereInput, options?: WriteOptions): Promise<number> {
    return this.run('update', { table, set, where: whereArg(where) }, () =>
      this.inner.update(table, set, where, options)
    );
  }

  delete(table: string, where?: WhereInput, options?: WriteOptions): Promise<number> {
    return this.run('delete', { table, where: whereArg(where) }, () => this.inner.delete(table, where, options));
  }

  private async run<T>(op: string, args: Record<string, unknown>, call: () => Promise<T>): Promise<T> {
    const start = performance.now();
    const entry: CommandLogEntry = { ts: new Date().toISOString(), op, args, ok: false, ms: 0 };
    try {
      const result = await call();
      entry.ok = true;
      return result;
    } catch (error) {
      entry.error = error instanceof Error ? error.message : String(error);
      throw error;
    } finally {
      const ms = performance.now() - start;
      entry.ms = Math.round(ms * 1000) / 1000;
      this.options.onTiming?.(op, ms);
      await this.record(entry);
    }
  }

  /** The command log is best effort: a failed append never fails the command */
  private async record(entry: CommandLogEntry): Promise<void> {
    if (!this.options.log) return;
    try {
      await this.options.log.append(entry);
    } catch (error) {
      logger.warn(
        `Command log write failed: ${error instanceof Error ? error.message : String(error)}`,
        'command-log'
      );
    }
  }
}

/** `[time] select: 0.42 ms` */
export function formatTiming(op: string, ms: number): string {
  return `[time] ${op}: ${ms.toFixed(2)} ms`;
}
