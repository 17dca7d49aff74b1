/**
 * Schema import/export as YAML
 *
 *   tables:
 *     users:
 *       name: str
 *       age: int
 */

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { TableOperations, TableSummary } from '../engine/index.js';
import { isRecord } from '../storage/codec.js';
import { SchemaError } from '../errors/index.js';

/** Type names stay unchecked text until create_table validates them */
export interface SchemaDocument {
  tables: Record<string, Record<string, string>>;
}

export interface ImportResult {
  created: string[];
  /** Tables that already existed; left untouched */
  skipped: string[];
}

export function exportSchema(tables: readonly TableSummary[]): string {
  const doc: SchemaDocument = { tables: {} };
  for (const { table, schema } of tables) {
    doc.tables[table] = { ...schema };
  }
  return stringifyYaml(doc);
}

/**
 * Parse and shape-check a schema file
 */
export function parseSchemaDocument(content: string): SchemaDocument {
  let value: unknown;
  try {
    value = parseYaml(content);
  } catch (err) {
    throw new SchemaError(`Invalid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!isRecord(value) || !isRecord(value.tables)) {
    throw new SchemaError('Invalid schema file: expected a "tables" mapping');
  }

  // Entries, not assignment: a `__proto__` key must reach create_table and fail there
  const tables: Array<[string, Record<string, string>]> = [];
  for (const [table, fields] of Object.entries(value.tables)) {
    if (!isRecord(fields)) {
      throw new SchemaError(`Invalid schema file: tables.${table}: expected a mapping of field to type`);
    }
    const schema: Array<[string, string]> = [];
    for (const [field, type] of Object.entries(fields)) {
      if (typeof type !== 'string') {
        throw new SchemaError(`Invalid schema file: tables.${table}.${field}: expected a type name`);
      }
      schema.push([field, type]);
    }
    tables.push([table, Object.fromEntries(schema)]);
  }
  return { tables: Object.fromEntries(tables) };
}

/**
 * Create every table the document names that does not exist yet
 */
export async function importSchema(engine: TableOperations, doc: SchemaDocument): Promise<ImportResult> {
  const existing = new Set((await engine.listTables()).map((t) => t.table));
  const result: ImportResult = { created: [], skipped: [] };

  for (const [table, schema] of Object.entries(doc.tables)) {
    if (existing.has(table)) {
      result.skipped.push(table);
      continue;
    }
    await engine.createTable(table, Object.entries(schema));
    result.created.push(table);
  }
  return result;
}
