/**
 * Wiring from resolved settings to a ready engine
 */

import type { Settings } from './types/index.js';
import { ConfigManager, resolveSettings } from './config/index.js';
import { JsonTableStore } from './storage/index.js';
import {
  CommandLog,
  InstrumentedEngine,
  SelectCache,
  TableEngine,
  commandLogPath,
  createConfirmer,
  formatTiming,
  type TableOperations,
} from './engine/index.js';
import { setVerbose } from './utils/logger.js';
import { outputNotice, setOutputOptions } from './utils/output.js';

/** Options shared by every command (see cli.ts) */
export type GlobalOptions = {
  config?: string;
  dataDir?: string;
  json?: boolean;
  verbose?: boolean;
  time?: boolean;
};

/**
 * Load the config file (defaults when absent) and apply command-line overrides
 */
export async function loadSettings(globals: GlobalOptions): Promise<Settings> {
  const manager = new ConfigManager(globals.config);
  const config = await manager.loadOrDefault();
  const settings = resolveSettings(config, manager.getConfigPath(), {
    dataDir: globals.dataDir,
    verbose: globals.verbose,
    timing: globals.time,
  });

  // log.verbose in the config file counts as --verbose
  setVerbose(settings.verbose);
  setOutputOptions({ verbose: settings.verbose });
  return settings;
}

export interface OpenOptions {
  /** Bulk-write confirmation question; absent when nobody can answer */
  ask?: (question: string) => Promise<string>;
}

/**
 * Build the engine stack: JSON store, select cache, confirmation policy,
 * then command log and timing around it
 */
export function openDatabase(settings: Settings, options: OpenOptions = {}): TableOperations {
  const engine = new TableEngine({
    store: new JsonTableStore(settings.dataDir),
    grammar: settings.grammar,
    cache: new SelectCache(settings.cacheEnabled),
    confirmer: createConfirmer({ policy: settings.bulkWrites, ask: options.ask }),
  });

  return new InstrumentedEngine(engine, {
    log: settings.commandLog
      ? new CommandLog({ logPath: commandLogPath(settings.dataDir), maxLines: settings.logMaxLines })
      : undefined,
    onTiming: settings.timing ? (op, ms) => outputNotice(formatTiming(op, ms)) : undefined,
  });
}
