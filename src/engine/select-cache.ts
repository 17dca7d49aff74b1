/**
 * Select result cache
 *
 * Keyed by (table, where signature, table version). Every write bumps the
 * table's version and drops its entries, so a hit is always current for
 * this engine instance. At most maxEntries results are kept; the least
 * recently used goes first.
 */

import type { Row } from '../types/index.js';

export interface CachedSelect {
  rows: Row[];
  fromCache: boolean;
}

function copyRows(rows: readonly Row[]): Row[] {
  return rows.map((row) => ({ ...row }));
}

/** Entries kept before the least recently used one is evicted */
export const DEFAULT_CACHE_ENTRIES = 64;

export class SelectCache {
  // Map order is recency order: oldest first
  private readonly entries = new Map<string, Row[]>();
  private readonly versions = new Map<string, number>();

  constructor(
    readonly enabled: boolean = true,
    readonly maxEntries: number = DEFAULT_CACHE_ENTRIES
  ) {}

  version(table: string): number {
    return this.versions.get(table) ?? 0;
  }

  /** Invalidate everything cached for a table */
  bump(table: string): void {
    this.versions.set(table, this.version(table) + 1);
    const prefix = `${table}\0`;
    for (const key of this.entries.keys()) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  async getOrCompute(table: string, signature: string, compute: () => Promise<Row[]>): Promise<CachedSelect> {
    if (!this.enabled) {
      return { rows: await compute(), fromCache: false };
    }

    const key = `${table}\0${signature}\0${this.version(table)}`;
    const hit = this.entries.get(key);
    if (hit) {
      this.entries.delete(key);
      this.entries.set(key, hit);
      return { rows: copyRows(hit), fromCache: true };
    }

    const rows = await compute();
    this.entries.set(key, copyRows(rows));
    this.evict();
    return { rows, fromCache: false };
  }

  private evict(): void {
    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) {
        return;
      }
      this.entries.delete(key);
    }
  }
}
