/**
 * Record and table types
 */

/** Closed set of column types */
export type TypeName = 'int' | 'float' | 'str' | 'bool';

/** A typed cell value. int and float are both JS numbers. */
export type ScalarValue = number | string | boolean | null;

/** One record: field name to value, `id` included */
export type Row = Record<string, ScalarValue>;

/** Raw user input for insert/update: field name to untyped text */
export type RawValues = Record<string, string>;

/** Ordered field name to type name mapping (declaration order is kept) */
export type SchemaFields = Record<string, TypeName>;

/** A `field:type` pair from a create-table command */
export type ColumnSpec = readonly [field: string, typeName: string];

/** Per-table metadata as persisted */
export interface TableMeta {
  schema: SchemaFields;
  last_id: number;
}

/** Contents of db_meta.json */
export interface MetaFile {
  tables: Record<string, TableMeta>;
}

/** Reserved system column */
export const ID_FIELD = 'id';
