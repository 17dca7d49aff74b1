import type { MetaFile, Row } from '../types/index.js';

/**
 * Persistence seam for the table engine. Implementations raise
 * StorageError for I/O and decode failures.
 */
export interface TableStore {
  readMeta(): Promise<MetaFile>;
  /** Atomic replace */
  writeMeta(meta: MetaFile): Promise<void>;
  /** Rows in file order; a missing file reads as no rows */
  readTable(table: string): Promise<Row[]>;
  /** Atomic replace */
  writeTable(table: string, rows: readonly Row[]): Promise<void>;
  removeTable(table: string): Promise<void>;
  /** Where the rows of a table live, for listings */
  tablePath(table: string): string;
}
