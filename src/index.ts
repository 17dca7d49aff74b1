/**
 * flatdb - programmatic API exports
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Coercion and schemas
export { coerce, stripQuotes, isNullToken, formatScalar } from './coerce/scalar.js';
export { SUPPORTED_TYPES, isTypeName } from './coerce/registry.js';
export { TableSchema, parseColumnSpec } from './schema/table-schema.js';
export { isIdentifier } from './schema/identifier.js';
export {
  exportSchema,
  importSchema,
  parseSchemaDocument,
  type ImportResult,
  type SchemaDocument,
} from './schema/schema-file.js';

// Where-clauses
export * from './filter/index.js';

// Storage and engine
export * from './storage/index.js';
export * from './engine/index.js';

// Command language
export { CommandExecutor, parseCommand, type ShellCommand, type ExecutionResult } from './shell/index.js';

// Configuration
export { ConfigManager, resolveSettings, validateConfig } from './config/index.js';
export { loadSettings, openDatabase, type GlobalOptions, type OpenOptions } from './app.js';
