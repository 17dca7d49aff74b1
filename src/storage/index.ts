export type { TableStore } from './types.js';
export { JsonTableStore, META_FILE, DATA_DIR } from './json-store.js';
export { MemoryTableStore } from './memory-store.js';
export { decodeMeta, encodeMeta, decodeRows, encodeRows } from './codec.js';
