#!/usr/bin/env node
/**
 * flatdb CLI
 *
 *   flatdb create-table users name:str age:int
 *   flatdb insert users name=Alice age=30
 *   flatdb select users --where "age >= 30"
 *   flatdb shell                 # interactive shell (default on a terminal)
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { resolveConfigPath } from './utils/config-path.js';
import { setOutputOptions } from './utils/output.js';
import { setVerbose } from './utils/logger.js';
import type { GlobalOptions } from './app.js';
import {
  createConfigCommand,
  createCreateTableCommand,
  createDeleteCommand,
  createDescribeCommand,
  createDropTableCommand,
  createExecCommand,
  createInsertCommand,
  createListTablesCommand,
  createLogCommand,
  createSchemaCommand,
  createSelectCommand,
  createShellCommand,
  createUpdateCommand,
  startShell,
} from './commands/index.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');
const VERSION = packageJson.version;

const program = new Command();

function getGlobals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function getConfigPath(): string {
  return resolveConfigPath({ configPath: getGlobals().config });
}

program
  .name('flatdb')
  .description('File-backed record store with typed tables')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config file')
  .option('-d, --data-dir <path>', 'Data directory (overrides config)')
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Verbose output')
  .option('--time', 'Print the time each operation took')
  .allowExcessArguments(false)
  .hook('preAction', () => {
    const opts = getGlobals();
    setVerbose(opts.verbose === true);
    setOutputOptions({
      json: opts.json,
      verbose: opts.verbose,
    });
  });

// Data commands
program.addCommand(createCreateTableCommand(getGlobals));
program.addCommand(createDropTableCommand(getGlobals));
program.addCommand(createListTablesCommand(getGlobals));
program.addCommand(createDescribeCommand(getGlobals));
program.addCommand(createInsertCommand(getGlobals));
program.addCommand(createSelectCommand(getGlobals));
program.addCommand(createUpdateCommand(getGlobals));
program.addCommand(createDeleteCommand(getGlobals));
program.addCommand(createExecCommand(getGlobals));

// Management
program.addCommand(createShellCommand(getGlobals));
program.addCommand(createConfigCommand(getConfigPath));
program.addCommand(createSchemaCommand(getGlobals));
program.addCommand(createLogCommand(getGlobals));

// No subcommand: shell on a terminal, help otherwise
program.action(async () => {
  if (process.stdin.isTTY && process.stdout.isTTY) {
    await startShell(getGlobals());
  } else {
    program.help();
  }
});

await program.parseAsync();
