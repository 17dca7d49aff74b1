import type { MetaFile, Row } from '../types/index.js';
import type { TableStore } from './types.js';

function copyMeta(meta: MetaFile): MetaFile {
  const tables: MetaFile['tables'] = {};
  for (const [name, entry] of Object.entries(meta.tables)) {
    tables[name] = { schema: { ...entry.schema }, last_id: entry.last_id };
  }
  return { tables };
}

/**
 * In-process store with the same copy semantics as the file store
 */
export class MemoryTableStore implements TableStore {
  private meta: MetaFile = { tables: {} };
  private readonly rows = new Map<string, Row[]>();
  /** Number of writeTable/writeMeta calls, for tests */
  writes = 0;

  async readMeta(): Promise<MetaFile> {
    return copyMeta(this.meta);
  }

  async writeMeta(meta: MetaFile): Promise<void> {
    this.writes++;
    this.meta = copyMeta(meta);
  }

  async readTable(table: string): Promise<Row[]> {
    return (this.rows.get(table) ?? []).map((row) => ({ ...row }));
  }

  async writeTable(table: string, rows: readonly Row[]): Promise<void> {
    this.writes++;
    this.rows.set(
      table,
      rows.map((row) => ({ ...row }))
    );
  }

  async removeTable(table: string): Promise<void> {
    this.rows.delete(table);
  }

  tablePath(table: string): string {
    return `memory:${table}`;
  }
}
