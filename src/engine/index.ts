export type { SelectResult, TableDescription, TableOperations, TableSummary, WriteOptions } from './types.js';
export { TableEngine, type TableEngineOptions } from './table-engine.js';
export { SelectCache, type CachedSelect } from './select-cache.js';
export { createConfirmer, isYes, ALWAYS_CONFIRM, type Confirmer, type Confirmation, type ConfirmerOptions } from './confirm.js';
export { CommandLog, commandLogPath, type CommandLogEntry, type CommandLogConfig } from './command-log.js';
export { InstrumentedEngine, formatTiming, type InstrumentationOptions } from './instrumented.js';
