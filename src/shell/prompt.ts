/**
 * Shell prompt generation with color support
 */

import { basename, resolve } from 'path';

/**
 * ANSI color codes
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  red: '\x1b[31m',
};

export function supportsColor(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  return process.stdout.isTTY === true;
}

function color(text: string, colorCode: string): string {
  if (!supportsColor()) {
    return text;
  }
  return `${colorCode}${text}${COLORS.reset}`;
}

/** Last path segment of the data directory; `/` for the root */
export function dataDirLabel(dataDir: string): string {
  return basename(resolve(dataDir)) || '/';
}

/**
 * Format: flatdb:<data dir name> >
 */
export function generatePrompt(dataDir: string): string {
  return `${color('flatdb', COLORS.dim)}:${color(dataDirLabel(dataDir), COLORS.cyan)} > `;
}

export function generatePlainPrompt(dataDir: string): string {
  return `flatdb:${dataDirLabel(dataDir)} > `;
}

export function printSuccess(message: string): void {
  console.log(color('✓ ' + message, COLORS.green));
}

export function printError(message: string): void {
  console.error(color(message, COLORS.red));
}

export function printInfo(message: string): void {
  console.log(color(message, COLORS.dim));
}
