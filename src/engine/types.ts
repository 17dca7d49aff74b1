import type { ColumnSpec, RawValues, Row, SchemaFields } from '../types/index.js';
import type { WhereInput } from '../filter/index.js';

export interface TableSummary {
  table: string;
  schema: SchemaFields;
  rowsFile: string;
}

export interface TableDescription {
  table: string;
  schema: SchemaFields;
  lastId: number;
  rowCount: number;
}

export interface SelectResult {
  rows: Row[];
  fromCache: boolean;
}

export interface WriteOptions {
  /** Skip the bulk-write confirmation (--yes) */
  assumeYes?: boolean;
}

/**
 * Everything the command layer can ask of the store. Implemented by
 * TableEngine and wrapped by InstrumentedEngine.
 */
export interface TableOperations {
  createTable(name: string, columns: readonly ColumnSpec[]): Promise<TableDescription>;
  dropTable(name: string, options?: WriteOptions): Promise<void>;
  listTables(): Promise<TableSummary[]>;
  describeTable(name: string): Promise<TableDescription>;
  insert(table: string, values: RawValues): Promise<Row>;
  select(table: string, where?: WhereInput): Promise<SelectResult>;
  update(table: string, set: RawValues, where?: WhereInput, options?: WriteOptions): Promise<number>;
  delete(table: string, where?: WhereInput, options?: WriteOptions): Promise<number>;
}
