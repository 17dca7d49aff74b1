export * from './database.js';
export * from './config.js';
