/**
 * Shared plumbing for commands that open the database
 */

import type { Settings } from '../types/index.js';
import type { TableOperations } from '../engine/index.js';
import { loadSettings, openDatabase, type GlobalOptions } from '../app.js';
import { isDbError } from '../errors/index.js';
import { askQuestion, canInteract } from '../utils/ask.js';
import { outputError } from '../utils/output.js';

/** Global options are read at action time, after the preAction hook ran */
export type GetGlobals = () => GlobalOptions;

/**
 * Print a failed command and set a failing exit code
 */
export function reportFailure(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  outputError(isDbError(error) ? message : `Unexpected error: ${message}`, error);
  process.exitCode = 1;
}

/**
 * Load settings, open the database and run an action against it.
 * Bulk-write confirmation is asked on the terminal when there is one.
 */
export async function withDatabase(
  getGlobals: GetGlobals,
  action: (db: TableOperations, settings: Settings) => Promise<void>
): Promise<void> {
  try {
    const settings = await loadSettings(getGlobals());
    const db = openDatabase(settings, { ask: canInteract() ? askQuestion : undefined });
    await action(db, settings);
  } catch (error) {
    reportFailure(error);
  }
}
