/**
 * Config and data path resolution
 *
 * Config file:
 * 1) --config <path>
 * 2) FLATDB_CONFIG environment variable
 * 3) ./flatdb.config.json
 *
 * Data directory:
 * 1) --data-dir <path>
 * 2) FLATDB_DATA_DIR environment variable
 * 3) `dataDir` from the config file, relative to that file
 * 4) current directory
 */

import { homedir, platform } from 'os';
import { dirname, join, resolve } from 'path';

export const CONFIG_FILE_NAME = 'flatdb.config.json';

/**
 * Per-user state directory (shell history)
 */
export function getUserStateDir(): string {
  const home = homedir();

  switch (platform()) {
    case 'win32':
      return join(process.env.APPDATA || join(home, 'AppData', 'Roaming'), 'flatdb');
    case 'darwin':
      return join(home, 'Library', 'Application Support', 'flatdb');
    default:
      return join(process.env.XDG_CONFIG_HOME || join(home, '.config'), 'flatdb');
  }
}

export function getHistoryPath(): string {
  return join(getUserStateDir(), 'shell_history');
}

export function getDefaultConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, CONFIG_FILE_NAME);
}

export interface ConfigPathOptions {
  configPath?: string; // --config argument
}

export function resolveConfigPath(options: ConfigPathOptions = {}): string {
  if (options.configPath) {
    return resolve(options.configPath);
  }

  const envPath = process.env.FLATDB_CONFIG;
  if (envPath) {
    return resolve(envPath);
  }

  return getDefaultConfigPath();
}

export interface DataDirOptions {
  /** --data-dir argument */
  dataDir?: string;
  /** `dataDir` from the loaded config */
  configDataDir?: string;
  /** Path of the config file the value came from */
  configPath: string;
}

export function resolveDataDir(options: DataDirOptions): string {
  if (options.dataDir) {
    return resolve(options.dataDir);
  }

  const envDir = process.env.FLATDB_DATA_DIR;
  if (envDir) {
    return resolve(envDir);
  }

  if (options.configDataDir) {
    return resolve(dirname(options.configPath), options.configDataDir);
  }

  return process.cwd();
}
