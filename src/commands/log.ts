/**
 * log - show or clear the command log (logs/commands.log under the data dir)
 */

import { Command } from 'commander';
import { CommandLog, commandLogPath, type CommandLogEntry } from '../engine/command-log.js';
import { loadSettings } from '../app.js';
import { ParseError } from '../errors/index.js';
import { output, outputSuccess } from '../utils/output.js';
import { reportFailure, type GetGlobals } from './common.js';

/** `[ts] op {args} 0.42 ms ok` */
export function formatLogEntry(entry: CommandLogEntry): string {
  const status = entry.ok ? 'ok' : `error: ${entry.error ?? 'unknown'}`;
  return `[${entry.ts}] ${entry.op} ${JSON.stringify(entry.args)} ${entry.ms.toFixed(2)} ms ${status}`;
}

function parseTail(value: string): number {
  const count = Number(value);
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new ParseError(`Invalid --tail value: ${value} (expected a positive integer)`);
  }
  return count;
}

export function createLogCommand(getGlobals: GetGlobals): Command {
  return new Command('log')
    .description('Show recent engine calls from the command log')
    .option('--tail <n>', 'Number of entries to show', '20')
    .option('--clear', 'Empty the command log')
    .action(async (options: { tail: string; clear?: boolean }) => {
      try {
        const settings = await loadSettings(getGlobals());
        const log = new CommandLog({ logPath: commandLogPath(settings.dataDir), maxLines: settings.logMaxLines });

        if (options.clear) {
          await log.clear();
          outputSuccess('Command log cleared');
          return;
        }

        const entries = await log.tail(parseTail(options.tail));
        output(entries, entries.length > 0 ? entries.map(formatLogEntry).join('\n') : 'No log entries.');
      } catch (error) {
        reportFailure(error);
      }
    });
}
