/**
 * Domain errors
 *
 * Every error the engine raises on purpose is a DbError. The command
 * boundary (shell executor, CLI actions) renders these as a single line;
 * anything else is treated as unexpected.
 */

export type DbErrorCode =
  | 'PARSE'
  | 'SCHEMA'
  | 'VALIDATION'
  | 'TYPE_MISMATCH'
  | 'UNKNOWN_FIELDS'
  | 'MISSING_FIELDS'
  | 'TABLE_EXISTS'
  | 'TABLE_NOT_FOUND'
  | 'STORAGE'
  | 'WHERE'
  | 'CANCELLED'
  | 'CONFIG';

export class DbError extends Error {
  constructor(
    message: string,
    public readonly code: DbErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'DbError';
  }
}

/** Malformed command or condition syntax */
export class ParseError extends DbError {
  constructor(message: string) {
    super(message, 'PARSE');
    this.name = 'ParseError';
  }
}

/** Invalid table or column definition */
export class SchemaError extends DbError {
  constructor(message: string) {
    super(message, 'SCHEMA');
    this.name = 'SchemaError';
  }
}

export class ValidationError extends DbError {
  constructor(
    message: string,
    code: 'VALIDATION' | 'TYPE_MISMATCH' | 'UNKNOWN_FIELDS' | 'MISSING_FIELDS' = 'VALIDATION'
  ) {
    super(message, code);
    this.name = 'ValidationError';
  }
}

/** A raw token could not be converted to the declared type */
export class TypeMismatchError extends ValidationError {
  constructor(
    message: string,
    public readonly typeName: string,
    public readonly raw: string
  ) {
    super(message, 'TYPE_MISMATCH');
    this.name = 'TypeMismatchError';
  }
}

export class UnknownFieldsError extends ValidationError {
  constructor(public readonly fields: string[]) {
    super(`Unknown fields: ${fields.join(', ')}`, 'UNKNOWN_FIELDS');
    this.name = 'UnknownFieldsError';
  }
}

export class MissingFieldsError extends ValidationError {
  constructor(public readonly fields: string[]) {
    super(`Missing fields: ${fields.join(', ')}`, 'MISSING_FIELDS');
    this.name = 'MissingFieldsError';
  }
}

export class TableExistsError extends DbError {
  constructor(public readonly table: string) {
    super(`Table already exists: '${table}'`, 'TABLE_EXISTS');
    this.name = 'TableExistsError';
  }
}

export class TableNotFoundError extends DbError {
  constructor(public readonly table: string) {
    super(`Table not found: '${table}'`, 'TABLE_NOT_FOUND');
    this.name = 'TableNotFoundError';
  }
}

/** I/O or JSON decode failure on the persisted files */
export class StorageError extends DbError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'STORAGE', options);
    this.name = 'StorageError';
  }
}

/**
 * Rejected where-expression. `position` is the 0-based offset in the
 * expression text when the failure can be pinned to one.
 */
export class WhereError extends DbError {
  constructor(
    message: string,
    public readonly position?: number
  ) {
    super(message, 'WHERE');
    this.name = 'WhereError';
  }
}

/** A destructive operation was not confirmed */
export class OperationCancelledError extends DbError {
  constructor(message: string = 'Cancelled.') {
    super(message, 'CANCELLED');
    this.name = 'OperationCancelledError';
  }
}

/** Unreadable or invalid configuration file */
export class ConfigError extends DbError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

export function isDbError(error: unknown): error is DbError {
  return error instanceof DbError;
}
