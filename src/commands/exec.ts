/**
 * exec - run one line of the shell language
 */

import { Command } from 'commander';
import { CommandExecutor } from '../shell/executor.js';
import { getOutputOptions } from '../utils/output.js';
import { withDatabase, type GetGlobals } from './common.js';

export function createExecCommand(getGlobals: GetGlobals): Command {
  return new Command('exec')
    .description('Run one shell command, e.g. exec "select users where age > 30"')
    .argument('<line...>', 'Command line (words are joined with spaces)')
    // a trailing --yes belongs to the line
    .allowUnknownOption()
    .action(async (words: string[]) => {
      await withDatabase(getGlobals, async (db, settings) => {
        const result = await new CommandExecutor(db, { verbose: settings.verbose }).run(words.join(' '));

        if (getOutputOptions().json) {
          console.log(JSON.stringify({ ok: result.ok, lines: result.lines }, null, 2));
        } else {
          const print = result.ok ? console.log : console.error;
          result.lines.forEach((line) => print(line));
        }
        if (!result.ok) {
          process.exitCode = 1;
        }
      });
    });
}
