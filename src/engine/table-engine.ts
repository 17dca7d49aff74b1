/**
 * Table engine
 *
 * Each operation reads meta fresh, works on the whole table in memory and
 * writes back through the store. Ids come from last_id only, so ids of
 * deleted rows are never handed out again.
 */

import type { ColumnSpec, MetaFile, RawValues, Row, TableMeta, WhereGrammar } from '../types/index.js';
import { ID_FIELD } from '../types/index.js';
import type { TableStore } from '../storage/index.js';
import type { SelectResult, TableDescription, TableOperations, TableSummary, WriteOptions } from './types.js';
import { compileWhere, type CompiledWhere, type WhereInput } from '../filter/index.js';
import { TableSchema } from '../schema/table-schema.js';
import { ensureIdentifier } from '../schema/identifier.js';
import { OperationCancelledError, TableExistsError, TableNotFoundError } from '../errors/index.js';
import { SelectCache } from './select-cache.js';
import { ALWAYS_CONFIRM, type Confirmer } from './confirm.js';

export interface TableEngineOptions {
  store: TableStore;
  /** Grammar for where-clauses given as text (default: strict) */
  grammar?: WhereGrammar;
  cache?: SelectCache;
  confirmer?: Confirmer;
}

export class TableEngine implements TableOperations {
  readonly store: TableStore;
  readonly grammar: WhereGrammar;
  readonly cache: SelectCache;
  private readonly confirmer: Confirmer;

  constructor(options: TableEngineOptions) {
    this.store = options.store;
    this.grammar = options.grammar ?? 'strict';
    this.cache = options.cache ?? new SelectCache();
    this.confirmer = options.confirmer ?? ALWAYS_CONFIRM;
  }

  async createTable(name: string, columns: readonly ColumnSpec[]): Promise<TableDescription> {
    ensureIdentifier(name, 'table');
    const meta = await this.store.readMeta();
    if (Object.hasOwn(meta.tables, name)) {
      throw new TableExistsError(name);
    }

    const schema = TableSchema.fromColumns(name, columns);
    await this.store.writeTable(name, []);
    meta.tables[name] = { schema: { ...schema.fields }, last_id: 0 };
    await this.store.writeMeta(meta);
    this.cache.bump(name);

    return { table: name, schema: { ...schema.fields }, lastId: 0, rowCount: 0 };
  }

  async dropTable(name: string, options: WriteOptions = {}): Promise<void> {
    const meta = await this.store.readMeta();
    this.entry(meta, name);

    await this.confirm(`Drop table '${name}' and all its rows?`, options);

    await this.store.removeTable(name);
    delete meta.tables[name];
    await this.store.writeMeta(meta);
    this.cache.bump(name);
  }

  async listTables(): Promise<TableSummary[]> {
    const meta = await this.store.readMeta();
    return Object.keys(meta.tables)
      .sort()
      .map((table) => ({
        table,
        schema: { ...meta.tables[table].schema },
        rowsFile: this.store.tablePath(table),
      }));
  }

  async describeTable(name: string): Promise<TableDescription> {
    const meta = await this.store.readMeta();
    const entry = this.entry(meta, name);
    const rows = await this.store.readTable(name);
    return { table: name, schema: { ...entry.schema }, lastId: entry.last_id, rowCount: rows.length };
  }

  /**
   * Validate, assign the next id and append
   * @returns the stored record, id included
   */
  async insert(table: string, values: RawValues): Promise<Row> {
    const meta = await this.store.readMeta();
    const entry = this.entry(meta, table);
    const row = new TableSchema(table, entry.schema).validateInsert(values);

    const id = entry.last_id + 1;
    const record: Row = { [ID_FIELD]: id, ...row };

    const rows = await this.store.readTable(table);
    rows.push(record);
    await this.store.writeTable(table, rows);
    entry.last_id = id;
    await this.store.writeMeta(meta);
    this.cache.bump(table);

    return { ...record };
  }

  async select(table: string, where?: WhereInput): Promise<SelectResult> {
    const meta = await this.store.readMeta();
    const schema = new TableSchema(table, this.entry(meta, table).schema);
    const compiled = compileWhere(where, this.grammar, schema);

    return this.cache.getOrCompute(table, compiled.signature, async () => {
      const rows = await this.store.readTable(table);
      return rows.filter(compiled.predicate);
    });
  }

  /**
   * @returns number of updated rows
   */
  async update(table: string, set: RawValues, where?: WhereInput, options: WriteOptions = {}): Promise<number> {
    const meta = await this.store.readMeta();
    const schema = new TableSchema(table, this.entry(meta, table).schema);
    const changes = schema.validateUpdate(set);
    const compiled = compileWhere(where, this.grammar, schema);

    if (isMatchAll(compiled)) {
      await this.confirm(`Update all rows in '${table}'?`, options);
    }

    const rows = await this.store.readTable(table);
    let count = 0;
    for (const row of rows) {
      if (compiled.predicate(row)) {
        Object.assign(row, changes);
        count++;
      }
    }

    if (count > 0) {
      await this.store.writeTable(table, rows);
      this.cache.bump(table);
    }
    return count;
  }

  /**
   * @returns number of deleted rows
   */
  async delete(table: string, where?: WhereInput, options: WriteOptions = {}): Promise<number> {
    const meta = await this.store.readMeta();
    const schema = new TableSchema(table, this.entry(meta, table).schema);
    const compiled = compileWhere(where, this.grammar, schema);

    if (isMatchAll(compiled)) {
      await this.confirm(`Delete all rows from '${table}'?`, options);
    }

    const rows = await this.store.readTable(table);
    const kept = rows.filter((row) => !compiled.predicate(row));
    const count = rows.length - kept.length;

    if (count > 0) {
      await this.store.writeTable(table, kept);
      this.cache.bump(table);
    }
    return count;
  }

  private entry(meta: MetaFile, table: string): TableMeta {
    if (!Object.hasOwn(meta.tables, table)) {
      throw new TableNotFoundError(table);
    }
    return meta.tables[table];
  }

  private async confirm(message: string, options: WriteOptions): Promise<void> {
    const decision = await this.confirmer.confirm(message, options.assumeYes ?? false);
    if (decision === 'declined') {
      throw new OperationCancelledError();
    }
    if (decision === 'refused') {
      throw new OperationCancelledError(`${message} Refused without confirmation (pass --yes)`);
    }
  }
}

function isMatchAll(where: CompiledWhere): boolean {
  return where.signature === '';
}
