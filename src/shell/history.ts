/**
 * Shell history management
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { getHistoryPath } from '../utils/config-path.js';
import { logger } from '../utils/logger.js';

export const MAX_HISTORY_SIZE = 1000;

/**
 * Load history from file, oldest first
 */
export function loadHistory(path: string = getHistoryPath()): string[] {
  if (!existsSync(path)) {
    return [];
  }

  try {
    const content = readFileSync(path, 'utf-8');
    return content.split('\n').filter((line) => line.trim() !== '');
  } catch (error) {
    logger.warn(`Cannot read history ${path}: ${error instanceof Error ? error.message : String(error)}`, 'shell');
    return [];
  }
}

/**
 * Save the newest MAX_HISTORY_SIZE entries
 */
export function saveHistory(history: string[], path: string = getHistoryPath()): void {
  const trimmed = history.slice(-MAX_HISTORY_SIZE);

  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, trimmed.join('\n') + '\n', 'utf-8');
  } catch (error) {
    logger.warn(`Cannot save history ${path}: ${error instanceof Error ? error.message : String(error)}`, 'shell');
  }
}

/**
 * Add a line to history (deduplicates consecutive entries)
 */
export function addToHistory(history: string[], line: string): string[] {
  const trimmed = line.trim();
  if (trimmed === '') {
    return history;
  }

  if (history.length > 0 && history[history.length - 1] === trimmed) {
    return history;
  }

  return [...history, trimmed];
}
