/**
 * Config manager - reads, writes and initializes flatdb.config.json
 */

import { DEFAULT_CONFIG, type Config } from '../types/index.js';
import { resolveConfigPath } from '../utils/config-path.js';
import { atomicWriteFile, readFileSafe, fileExists } from '../utils/fs.js';
import { formatIssues, parseConfig, validateConfig, type ValidationResult } from './schema.js';
import { ConfigError } from '../errors/index.js';
import { dirname } from 'path';

/** Written by `config init` */
export const INIT_CONFIG: Config = {
  version: 1,
  dataDir: '.',
  where: { grammar: 'strict' },
  bulkWrites: 'prompt',
  cache: { enabled: true },
  log: { commands: true, timing: false, verbose: false, maxLines: 1000 },
};

export class ConfigManager {
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = resolveConfigPath({ configPath });
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfigDir(): string {
    return dirname(this.configPath);
  }

  async exists(): Promise<boolean> {
    return fileExists(this.configPath);
  }

  /**
   * @throws ConfigError when the file is missing or invalid
   */
  async load(): Promise<Config> {
    const config = await this.read();
    if (config === null) {
      throw new ConfigError(`Config file not found: ${this.configPath}`);
    }
    return config;
  }

  /**
   * Defaults when the file does not exist; an invalid file still throws
   */
  async loadOrDefault(): Promise<Config> {
    return (await this.read()) ?? { ...DEFAULT_CONFIG };
  }

  async save(config: Config): Promise<void> {
    const result = validateConfig(config);
    if (!result.valid) {
      throw new ConfigError(`Invalid config: ${formatIssues(result.errors)}`);
    }
    await atomicWriteFile(this.configPath, JSON.stringify(config, null, 2) + '\n');
  }

  async init(force: boolean = false): Promise<{ created: boolean; path: string }> {
    if ((await this.exists()) && !force) {
      return { created: false, path: this.configPath };
    }
    await this.save(INIT_CONFIG);
    return { created: true, path: this.configPath };
  }

  async validate(): Promise<ValidationResult> {
    const content = await readFileSafe(this.configPath);
    if (content === null) {
      return { valid: false, errors: [{ path: '', message: 'Config file not found' }] };
    }
    const { errors } = parseConfig(content);
    return { valid: errors.length === 0, errors };
  }

  private async read(): Promise<Config | null> {
    const content = await readFileSafe(this.configPath);
    if (content === null) {
      return null;
    }
    const { config, errors } = parseConfig(content);
    if (!config) {
      throw new ConfigError(`Invalid config ${this.configPath}: ${formatIssues(errors)}`);
    }
    return config;
  }
}
