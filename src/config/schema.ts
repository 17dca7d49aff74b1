/**
 * Config schema validation
 */

import type { BulkWritePolicy, Config, LogConfig, WhereGrammar } from '../types/index.js';
import { isRecord } from '../storage/codec.js';

export interface ConfigIssue {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ConfigIssue[];
}

const GRAMMARS: readonly WhereGrammar[] = ['strict', 'expression'];
const BULK_WRITE_POLICIES: readonly BulkWritePolicy[] = ['prompt', 'require-flag', 'allow'];
const TOP_LEVEL_KEYS = ['version', 'dataDir', 'where', 'bulkWrites', 'cache', 'log'];
const LOG_FLAGS = ['commands', 'timing', 'verbose'] as const;

function isGrammar(value: unknown): value is WhereGrammar {
  return GRAMMARS.some((g) => g === value);
}

function isBulkWritePolicy(value: unknown): value is BulkWritePolicy {
  return BULK_WRITE_POLICIES.some((p) => p === value);
}

/**
 * Validate a parsed config document and build the typed config from it
 */
export function readConfig(value: unknown): { config: Config | null; errors: ConfigIssue[] } {
  if (!isRecord(value)) {
    return { config: null, errors: [{ path: '', message: 'config must be an object' }] };
  }

  const errors: ConfigIssue[] = [];
  const config: Config = { version: 1 };

  if (value.version !== 1) {
    errors.push({ path: 'version', message: 'version must be 1' });
  }

  for (const key of Object.keys(value)) {
    if (!TOP_LEVEL_KEYS.includes(key)) {
      errors.push({ path: key, message: 'unknown key' });
    }
  }

  if (value.dataDir !== undefined) {
    if (typeof value.dataDir !== 'string' || !value.dataDir.trim()) {
      errors.push({ path: 'dataDir', message: 'dataDir must be a non-empty string' });
    } else {
      config.dataDir = value.dataDir;
    }
  }

  if (value.where !== undefined) {
    if (!isRecord(value.where)) {
      errors.push({ path: 'where', message: 'where must be an object' });
    } else if (value.where.grammar !== undefined) {
      const grammar = value.where.grammar;
      if (isGrammar(grammar)) {
        config.where = { grammar };
      } else {
        errors.push({ path: 'where.grammar', message: `grammar must be one of: ${GRAMMARS.join(', ')}` });
      }
    } else {
      config.where = {};
    }
  }

  if (value.bulkWrites !== undefined) {
    if (isBulkWritePolicy(value.bulkWrites)) {
      config.bulkWrites = value.bulkWrites;
    } else {
      errors.push({ path: 'bulkWrites', message: `bulkWrites must be one of: ${BULK_WRITE_POLICIES.join(', ')}` });
    }
  }

  if (value.cache !== undefined) {
    if (!isRecord(value.cache)) {
      errors.push({ path: 'cache', message: 'cache must be an object' });
    } else if (value.cache.enabled !== undefined && typeof value.cache.enabled !== 'boolean') {
      errors.push({ path: 'cache.enabled', message: 'enabled must be a boolean' });
    } else {
      config.cache = typeof value.cache.enabled === 'boolean' ? { enabled: value.cache.enabled } : {};
    }
  }

  if (value.log !== undefined) {
    if (!isRecord(value.log)) {
      errors.push({ path: 'log', message: 'log must be an object' });
    } else {
      const log: LogConfig = {};
      for (const flag of LOG_FLAGS) {
        const flagValue = value.log[flag];
        if (flagValue === undefined) continue;
        if (typeof flagValue === 'boolean') {
          log[flag] = flagValue;
        } else {
          errors.push({ path: `log.${flag}`, message: `${flag} must be a boolean` });
        }
      }
      const maxLines = value.log.maxLines;
      if (maxLines !== undefined) {
        if (typeof maxLines === 'number' && Number.isInteger(maxLines) && maxLines >= 2) {
          log.maxLines = maxLines;
        } else {
          errors.push({ path: 'log.maxLines', message: 'maxLines must be an integer >= 2' });
        }
      }
      config.log = log;
    }
  }

  return errors.length === 0 ? { config, errors } : { config: null, errors };
}

export function validateConfig(value: unknown): ValidationResult {
  const { errors } = readConfig(value);
  return { valid: errors.length === 0, errors };
}

/**
 * Parse and validate config JSON
 */
export function parseConfig(jsonString: string): { config: Config | null; errors: ConfigIssue[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (e) {
    return {
      config: null,
      errors: [{ path: '', message: `Invalid JSON: ${e instanceof Error ? e.message : 'parse error'}` }],
    };
  }
  return readConfig(parsed);
}

export function formatIssues(errors: readonly ConfigIssue[]): string {
  return errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join(', ');
}
