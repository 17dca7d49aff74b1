/**
 * Shell command - interactive REPL
 */

import { Command } from 'commander';
import { ShellRepl } from '../shell/index.js';
import { loadSettings, openDatabase, type GlobalOptions } from '../app.js';
import { reportFailure, type GetGlobals } from './common.js';

/**
 * Run the shell until exit. Piped input runs line by line without a prompt;
 * bulk writes can only be confirmed on a terminal.
 */
export async function startShell(globals: GlobalOptions): Promise<void> {
  try {
    const settings = await loadSettings(globals);
    const interactive = process.stdin.isTTY === true;
    const repl: ShellRepl = new ShellRepl(
      openDatabase(settings, { ask: interactive ? (question) => repl.ask(question) : undefined }),
      { dataDir: settings.dataDir, verbose: settings.verbose }
    );
    await repl.start();
  } catch (error) {
    reportFailure(error);
  }
}

export function createShellCommand(getGlobals: GetGlobals): Command {
  return new Command('shell').description('Start interactive shell (REPL)').action(async () => {
    await startShell(getGlobals());
  });
}
