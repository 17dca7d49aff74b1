/**
 * Config commands
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import { output, outputSuccess, outputError } from '../utils/output.js';
import { reportFailure } from './common.js';

export function createConfigCommand(getConfigPath: () => string): Command {
  const cmd = new Command('config').description('Manage flatdb configuration');

  cmd
    .command('path')
    .description('Show the config file path')
    .action(() => {
      const configPath = getConfigPath();
      output({ path: configPath }, configPath);
    });

  cmd
    .command('init')
    .description('Write a config file with every default spelled out')
    .option('-f, --force', 'Overwrite existing config')
    .action(async (options: { force?: boolean }) => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const result = await manager.init(options.force);

        if (result.created) {
          outputSuccess(`Config created at: ${result.path}`);
        } else {
          output(
            { exists: true, path: result.path },
            `Config already exists at: ${result.path}\nUse --force to overwrite.`
          );
        }
      } catch (error) {
        reportFailure(error);
      }
    });

  cmd
    .command('show')
    .description('Show the config in effect (defaults when no file exists)')
    .action(async () => {
      try {
        const config = await new ConfigManager(getConfigPath()).loadOrDefault();
        console.log(JSON.stringify(config, null, 2));
      } catch (error) {
        reportFailure(error);
      }
    });

  cmd
    .command('validate')
    .description('Validate the config file')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const result = await manager.validate();

        if (result.valid) {
          outputSuccess('Config is valid');
          return;
        }

        outputError(
          `Config validation failed:\n${result.errors.map((e) => `  - ${e.path || '(root)'}: ${e.message}`).join('\n')}`
        );
        process.exitCode = 1;
      } catch (error) {
        reportFailure(error);
      }
    });

  return cmd;
}
