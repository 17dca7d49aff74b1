export * from './common.js';
export * from './tables.js';
export * from './rows.js';
export * from './exec.js';
export * from './shell.js';
export * from './config.js';
export * from './schema.js';
export * from './log.js';
