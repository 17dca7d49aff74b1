/**
 * Decoding and encoding of the persisted JSON documents
 *
 * Meta (current):  {"tables": {name: {"last_id": n, "schema": {field: type}}}}
 * Meta (legacy):   {"tables": {name: {field: type}}, "counters": {name: n}}
 * Rows:            [{"age": 30, "id": 1, "name": "Alice"}, ...]
 */

import type { MetaFile, Row, ScalarValue, SchemaFields, TableMeta } from '../types/index.js';
import { isTypeName } from '../coerce/registry.js';
import { isIdentifier } from '../schema/identifier.js';
import { StorageError } from '../errors/index.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is ScalarValue {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

function parseJson(content: string, source: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StorageError(`Corrupt JSON in ${source}: ${reason}`, { cause: error });
  }
}

function decodeSchema(value: unknown, where: string): SchemaFields {
  if (!isRecord(value)) {
    throw new StorageError(`${where}: schema must be an object`);
  }
  const schema: SchemaFields = {};
  for (const [field, typeName] of Object.entries(value)) {
    if (!isIdentifier(field)) {
      throw new StorageError(`${where}: invalid field name ${JSON.stringify(field)}`);
    }
    if (typeof typeName !== 'string' || !isTypeName(typeName)) {
      throw new StorageError(`${where}: unsupported type for '${field}': ${JSON.stringify(typeName)}`);
    }
    schema[field] = typeName;
  }
  return schema;
}

function decodeLastId(value: unknown, where: string): number {
  if (value === undefined) return 0;
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new StorageError(`${where}: last_id must be a non-negative integer`);
  }
  return value;
}

export function decodeMeta(content: string, source: string): MetaFile {
  const doc = parseJson(content, source);
  if (!isRecord(doc)) {
    throw new StorageError(`${source}: expected an object`);
  }

  const tables = doc.tables ?? {};
  if (!isRecord(tables)) {
    throw new StorageError(`${source}: "tables" must be an object`);
  }
  const counters = doc.counters ?? {};
  if (!isRecord(counters)) {
    throw new StorageError(`${source}: "counters" must be an object`);
  }

  const meta: MetaFile = { tables: {} };
  for (const [name, entry] of Object.entries(tables)) {
    const where = `${source}: table '${name}'`;
    if (!isIdentifier(name)) {
      throw new StorageError(`${source}: invalid table name ${JSON.stringify(name)}`);
    }
    if (!isRecord(entry)) {
      throw new StorageError(`${where}: entry must be an object`);
    }
    // Legacy entries are the bare field -> type mapping
    meta.tables[name] = isRecord(entry.schema)
      ? { schema: decodeSchema(entry.schema, where), last_id: decodeLastId(entry.last_id, where) }
      : { schema: decodeSchema(entry, where), last_id: decodeLastId(counters[name], where) };
  }
  return meta;
}

export function encodeMeta(meta: MetaFile): string {
  const tables: Record<string, TableMeta> = {};
  for (const name of Object.keys(meta.tables).sort()) {
    const entry = meta.tables[name];
    tables[name] = { last_id: entry.last_id, schema: { ...entry.schema } };
  }
  return JSON.stringify({ tables }, null, 2) + '\n';
}

export function decodeRows(content: string, source: string): Row[] {
  const doc = parseJson(content, source);
  if (!Array.isArray(doc)) {
    throw new StorageError(`${source}: expected an array of rows`);
  }

  return doc.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new StorageError(`${source}: row ${index} must be an object`);
    }
    const fields = Object.entries(item).map(([field, value]): [string, ScalarValue] => {
      if (!isScalar(value)) {
        throw new StorageError(`${source}: row ${index} field '${field}' is not a scalar`);
      }
      return [field, value];
    });
    return Object.fromEntries(fields);
  });
}

/** Keys sorted so files diff cleanly */
export function encodeRows(rows: readonly Row[]): string {
  const sorted = rows.map((row) =>
    Object.fromEntries(
      Object.keys(row)
        .sort()
        .map((key): [string, ScalarValue] => [key, row[key]])
    )
  );
  return JSON.stringify(sorted, null, 2) + '\n';
}
