/**
 * Configuration types for flatdb
 */

/**
 * Where-clause grammar
 * - strict: `field op value` phrases joined by `and` (no `or`)
 * - expression: boolean expressions with and/or/parentheses
 */
export type WhereGrammar = 'strict' | 'expression';

/**
 * Policy for update/delete without a where-clause and for drop_table
 * - prompt: ask interactively; refuse when no terminal is attached
 * - require-flag: only an explicit --yes allows it
 * - allow: never ask
 */
export type BulkWritePolicy = 'prompt' | 'require-flag' | 'allow';

export interface WhereConfig {
  grammar?: WhereGrammar;
}

export interface CacheConfig {
  enabled?: boolean;
}

export interface LogConfig {
  /** Append every engine call to logs/commands.log */
  commands?: boolean;
  /** Print `[time] op: N ms` after each engine call */
  timing?: boolean;
  /** Show INFO-level diagnostics on stderr */
  verbose?: boolean;
  /** Ring buffer size for the command log */
  maxLines?: number;
}

export interface Config {
  version: 1;
  /** Data directory, relative to the config file */
  dataDir?: string;
  where?: WhereConfig;
  bulkWrites?: BulkWritePolicy;
  cache?: CacheConfig;
  log?: LogConfig;
}

export const DEFAULT_CONFIG: Config = {
  version: 1,
};

/** Settings with every default applied */
export interface Settings {
  dataDir: string;
  grammar: WhereGrammar;
  bulkWrites: BulkWritePolicy;
  cacheEnabled: boolean;
  commandLog: boolean;
  timing: boolean;
  verbose: boolean;
  logMaxLines: number;
}

export const DEFAULT_LOG_MAX_LINES = 1000;
