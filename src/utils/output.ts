/**
 * Output utilities for CLI and shell
 */

import type { Row, ScalarValue, SchemaFields } from '../types/index.js';
import { ID_FIELD } from '../types/index.js';
import { isDbError } from '../errors/index.js';

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

let globalOptions: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  globalOptions = { ...globalOptions, ...options };
}

export function getOutputOptions(): OutputOptions {
  return globalOptions;
}

export function output(data: unknown, humanReadable?: string): void {
  if (globalOptions.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(humanReadable ?? String(data));
  }
}

/**
 * Report a failed command. Domain errors carry their code; anything else
 * shows its stack under --verbose.
 */
export function outputError(message: string, error?: unknown): void {
  if (globalOptions.json) {
    const payload: { error: string; code?: string } = { error: message };
    if (isDbError(error)) {
      payload.code = error.code;
    }
    console.error(JSON.stringify(payload));
    return;
  }

  console.error(`Error: ${message}`);
  if (error instanceof Error && !isDbError(error) && globalOptions.verbose) {
    console.error(error.stack);
  }
}

export function outputSuccess(message: string, data?: unknown): void {
  if (globalOptions.json) {
    const result: { success: boolean; message: string; data?: unknown } = {
      success: true,
      message,
    };
    if (data !== undefined) {
      result.data = data;
    }
    console.log(JSON.stringify(result));
  } else {
    console.log(`✓ ${message}`);
  }
}

/**
 * Diagnostics that must not mix with results on stdout
 */
export function outputNotice(message: string): void {
  console.error(message);
}

/**
 * Lay out a text table: header, dash rule, one line per row
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) => {
    const cellWidths = [h.length, ...rows.map((r) => (r[i] ?? '').length)];
    return Math.max(...cellWidths);
  });

  const pad = (cells: string[]): string =>
    cells
      .map((cell, i) => (cell ?? '').padEnd(widths[i]))
      .join('  ')
      .trimEnd();

  const headerLine = pad(headers);
  return [headerLine, '-'.repeat(headerLine.length), ...rows.map(pad)];
}

export function outputTable(headers: string[], rows: string[][]): void {
  if (globalOptions.json) {
    const objects = rows.map((row) => {
      const obj: Record<string, string> = {};
      headers.forEach((h, i) => {
        obj[h] = row[i] ?? '';
      });
      return obj;
    });
    console.log(JSON.stringify(objects, null, 2));
    return;
  }

  for (const line of formatTable(headers, rows)) {
    console.log(line);
  }
}

export function formatCell(value: ScalarValue | undefined): string {
  if (value === undefined) return '';
  if (value === null) return 'null';
  return String(value);
}

/** `id` first, then every other field alphabetically */
export function orderColumns(rows: readonly Row[]): string[] {
  const fields = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (key !== ID_FIELD) fields.add(key);
    }
  }
  const sorted = [...fields].sort();
  return rows.some((row) => Object.hasOwn(row, ID_FIELD)) ? [ID_FIELD, ...sorted] : sorted;
}

/**
 * Select results as text lines
 */
export function renderRows(rows: readonly Row[], fromCache: boolean = false): string[] {
  if (rows.length === 0) {
    return ['Empty result.'];
  }
  const columns = orderColumns(rows);
  const lines = formatTable(
    columns,
    rows.map((row) => columns.map((c) => formatCell(row[c])))
  );
  return fromCache ? [...lines, '[cache]'] : lines;
}

/** `name:str age:int` */
export function formatSchema(schema: SchemaFields): string {
  return Object.entries(schema)
    .map(([field, type]) => `${field}:${type}`)
    .join(' ');
}

/** `Updated 1 row`, `Deleted 3 rows` */
export function formatCount(verb: string, count: number): string {
  return `${verb} ${count} row${count === 1 ? '' : 's'}`;
}

export function renderTableList(tables: ReadonlyArray<{ table: string; schema: SchemaFields }>): string[] {
  if (tables.length === 0) {
    return ['No tables.'];
  }
  return formatTable(
    ['table', 'columns'],
    tables.map((t) => [t.table, formatSchema(t.schema)])
  );
}

export function renderDescription(info: { table: string; schema: SchemaFields; lastId: number; rowCount: number }): string[] {
  return [
    `table:   ${info.table}`,
    `columns: ${ID_FIELD}:int ${formatSchema(info.schema)}`,
    `last id: ${info.lastId}`,
    `rows:    ${info.rowCount}`,
  ];
}
