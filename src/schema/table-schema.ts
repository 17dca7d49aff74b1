/**
 * Table schema and payload validation
 */

import type { ColumnSpec, RawValues, Row, SchemaFields, TypeName } from '../types/index.js';
import { ID_FIELD } from '../types/index.js';
import {
  MissingFieldsError,
  ParseError,
  SchemaError,
  UnknownFieldsError,
  ValidationError,
} from '../errors/index.js';
import { SUPPORTED_TYPES, isTypeName } from '../coerce/registry.js';
import { coerce } from '../coerce/scalar.js';
import { isIdentifier } from './identifier.js';

/**
 * Parse a `field:type` column spec
 */
export function parseColumnSpec(spec: string): ColumnSpec {
  const sep = spec.indexOf(':');
  if (sep === -1) {
    throw new ParseError(`Expected <field:type>, got: ${JSON.stringify(spec)}`);
  }
  return [spec.slice(0, sep).trim(), spec.slice(sep + 1).trim()];
}

export class TableSchema {
  readonly name: string;
  readonly fields: Readonly<SchemaFields>;

  constructor(name: string, fields: SchemaFields) {
    this.name = name;
    this.fields = Object.freeze({ ...fields });
  }

  /**
   * Build a schema from create-table columns.
   * Columns must be non-empty, named with identifiers, typed with a
   * supported type, unique, and must not redeclare `id`.
   */
  static fromColumns(name: string, columns: readonly ColumnSpec[]): TableSchema {
    if (columns.length === 0) {
      throw new SchemaError('A table needs at least one column');
    }

    const fields: SchemaFields = {};
    for (const [field, typeName] of columns) {
      if (!isIdentifier(field)) {
        throw new SchemaError(`Invalid field name: ${JSON.stringify(field)}`);
      }
      if (field === ID_FIELD) {
        throw new SchemaError(`Field '${ID_FIELD}' is reserved (assigned automatically)`);
      }
      if (Object.hasOwn(fields, field)) {
        throw new SchemaError(`Duplicate field: '${field}'`);
      }
      if (!isTypeName(typeName)) {
        throw new SchemaError(
          `Unsupported type for '${field}': '${typeName}' (expected one of ${SUPPORTED_TYPES.join(', ')})`
        );
      }
      fields[field] = typeName;
    }
    return new TableSchema(name, fields);
  }

  /** Declared fields in declaration order (without `id`) */
  get fieldNames(): string[] {
    return Object.keys(this.fields);
  }

  /**
   * Type of a field; `id` is always int
   */
  typeOf(field: string): TypeName | undefined {
    if (field === ID_FIELD) return 'int';
    return Object.hasOwn(this.fields, field) ? this.fields[field] : undefined;
  }

  /**
   * Validate and coerce a full insert payload. The returned row has no id.
   */
  validateInsert(values: RawValues): Row {
    if (Object.hasOwn(values, ID_FIELD)) {
      throw new ValidationError(`Field '${ID_FIELD}' is assigned automatically`);
    }

    const missing = this.fieldNames.filter((f) => !Object.hasOwn(values, f));
    if (missing.length > 0) {
      throw new MissingFieldsError(missing);
    }

    const unknown = Object.keys(values).filter((f) => this.typeOf(f) === undefined);
    if (unknown.length > 0) {
      throw new UnknownFieldsError(unknown);
    }

    const row: Row = {};
    for (const [field, typeName] of Object.entries(this.fields)) {
      row[field] = coerce(values[field], typeName);
    }
    return row;
  }

  /**
   * Validate and coerce a partial update payload
   */
  validateUpdate(values: RawValues): Row {
    const names = Object.keys(values);
    if (names.length === 0) {
      throw new ValidationError('update requires set');
    }
    if (names.includes(ID_FIELD)) {
      throw new ValidationError(`Field '${ID_FIELD}' cannot be changed`);
    }

    const unknown = names.filter((f) => this.typeOf(f) === undefined);
    if (unknown.length > 0) {
      throw new UnknownFieldsError(unknown);
    }

    const changes: Row = {};
    for (const field of names) {
      changes[field] = coerce(values[field], this.fields[field]);
    }
    return changes;
  }
}
