import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  resolveConfigPath,
  resolveDataDir,
  getDefaultConfigPath,
  getHistoryPath,
  getUserStateDir,
} from './config-path.js';
import { homedir } from 'os';
import { join, resolve } from 'path';

describe('config-path', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.FLATDB_CONFIG;
    delete process.env.FLATDB_DATA_DIR;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('resolveConfigPath', () => {
    it('prioritizes --config', () => {
      process.env.FLATDB_CONFIG = '/env/flatdb.config.json';
      expect(resolveConfigPath({ configPath: '/custom/config.json' })).toBe('/custom/config.json');
    });

    it('uses FLATDB_CONFIG without --config', () => {
      process.env.FLATDB_CONFIG = '/env/flatdb.config.json';
      expect(resolveConfigPath({})).toBe('/env/flatdb.config.json');
    });

    it('falls back to the current directory', () => {
      expect(resolveConfigPath()).toBe(join(process.cwd(), 'flatdb.config.json'));
      expect(getDefaultConfigPath('/work')).toBe(join('/work', 'flatdb.config.json'));
    });
  });

  describe('resolveDataDir', () => {
    it('prioritizes --data-dir over everything', () => {
      process.env.FLATDB_DATA_DIR = '/env/data';
      expect(resolveDataDir({ dataDir: '/cli/data', configDataDir: 'db', configPath: '/cfg/flatdb.config.json' })).toBe(
        '/cli/data'
      );
    });

    it('uses FLATDB_DATA_DIR before the config file', () => {
      process.env.FLATDB_DATA_DIR = '/env/data';
      expect(resolveDataDir({ configDataDir: 'db', configPath: '/cfg/flatdb.config.json' })).toBe('/env/data');
    });

    it('resolves the config value against the config file', () => {
      expect(resolveDataDir({ configDataDir: 'db', configPath: '/cfg/flatdb.config.json' })).toBe(resolve('/cfg/db'));
    });

    it('falls back to the current directory', () => {
      expect(resolveDataDir({ configPath: '/cfg/flatdb.config.json' })).toBe(process.cwd());
    });
  });

  describe('getUserStateDir', () => {
    it('is a flatdb directory under the home or app data directory', () => {
      const dir = getUserStateDir();
      expect(dir).toContain('flatdb');
      expect(dir.startsWith(homedir()) || dir.includes('AppData') || Boolean(process.env.XDG_CONFIG_HOME)).toBe(true);
      expect(getHistoryPath()).toBe(join(dir, 'shell_history'));
    });
  });
});
