/**
 * File-backed table store
 *
 * <dataDir>/db_meta.json        table schemas and id counters
 * <dataDir>/data/<table>.json   rows of one table
 */

import { join } from 'path';
import type { MetaFile, Row } from '../types/index.js';
import type { TableStore } from './types.js';
import { decodeMeta, decodeRows, encodeMeta, encodeRows } from './codec.js';
import { atomicWriteFile, readFileSafe, removeFile } from '../utils/fs.js';
import { StorageError, isDbError } from '../errors/index.js';

export const META_FILE = 'db_meta.json';
export const DATA_DIR = 'data';

export class JsonTableStore implements TableStore {
  readonly metaPath: string;

  constructor(readonly dataDir: string) {
    this.metaPath = join(dataDir, META_FILE);
  }

  tablePath(table: string): string {
    return join(this.dataDir, DATA_DIR, `${table}.json`);
  }

  async readMeta(): Promise<MetaFile> {
    const content = await this.io('read', this.metaPath, () => readFileSafe(this.metaPath));
    return content === null ? { tables: {} } : decodeMeta(content, this.metaPath);
  }

  async writeMeta(meta: MetaFile): Promise<void> {
    await this.io('write', this.metaPath, () => atomicWriteFile(this.metaPath, encodeMeta(meta)));
  }

  async readTable(table: string): Promise<Row[]> {
    const path = this.tablePath(table);
    const content = await this.io('read', path, () => readFileSafe(path));
    return content === null ? [] : decodeRows(content, path);
  }

  async writeTable(table: string, rows: readonly Row[]): Promise<void> {
    const path = this.tablePath(table);
    await this.io('write', path, () => atomicWriteFile(path, encodeRows(rows)));
  }

  async removeTable(table: string): Promise<void> {
    const path = this.tablePath(table);
    await this.io('remove', path, () => removeFile(path));
  }

  /** Run a file operation, reporting OS errors as StorageError */
  private async io<T>(action: string, path: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isDbError(error)) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new StorageError(`Cannot ${action} ${path}: ${reason}`, { cause: error });
    }
  }
}
