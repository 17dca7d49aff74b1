import { DEFAULT_LOG_MAX_LINES, type Config, type Settings } from '../types/index.js';
import { resolveDataDir } from '../utils/config-path.js';

export interface SettingsOverrides {
  /** --data-dir */
  dataDir?: string;
  /** --verbose */
  verbose?: boolean;
  /** --time */
  timing?: boolean;
}

/**
 * Apply defaults and command-line overrides to a loaded config
 */
export function resolveSettings(config: Config, configPath: string, overrides: SettingsOverrides = {}): Settings {
  return {
    dataDir: resolveDataDir({ dataDir: overrides.dataDir, configDataDir: config.dataDir, configPath }),
    grammar: config.where?.grammar ?? 'strict',
    bulkWrites: config.bulkWrites ?? 'prompt',
    cacheEnabled: config.cache?.enabled ?? true,
    commandLog: config.log?.commands ?? true,
    timing: overrides.timing || (config.log?.timing ?? false),
    verbose: overrides.verbose || (config.log?.verbose ?? false),
    logMaxLines: config.log?.maxLines ?? DEFAULT_LOG_MAX_LINES,
  };
}
