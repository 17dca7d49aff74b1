/**
 * Diagnostic logger
 *
 * Writes to stderr so stdout stays clean for results and --json output.
 *
 * Log levels:
 * - ERROR: Always output (red)
 * - WARN: Always output (yellow)
 * - INFO: Only when verbose mode enabled (no color)
 */

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

const COLORS = {
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  RESET: '\x1b[0m',
} as const;

export { COLORS as LOG_COLORS };

/** Global verbose flag - set from --verbose or log.verbose */
let verboseMode = false;

/**
 * Current time in HH:MM:SS.mmm format
 */
function now(): string {
  return new Date().toISOString().slice(11, 23);
}

export function formatLogLine(level: LogLevel, msg: string, category?: string, timestamp: string = now()): string {
  const categoryStr = category ? `[${category}] ` : '';
  return `[${timestamp}] [${level}] ${categoryStr}${msg}`;
}

function log(level: LogLevel, msg: string, category?: string): void {
  if (level === 'INFO' && !verboseMode) {
    return;
  }

  const line = formatLogLine(level, msg, category);
  if (level === 'INFO') {
    process.stderr.write(line + '\n');
  } else {
    process.stderr.write(COLORS[level] + line + COLORS.RESET + '\n');
  }
}

export function setVerbose(enabled: boolean): void {
  verboseMode = enabled;
}

export function isVerbose(): boolean {
  return verboseMode;
}

/**
 * Logger instance with optional category support
 */
export const logger = {
  /** Only shown when verbose mode is enabled */
  info: (msg: string, category?: string): void => log('INFO', msg, category),
  warn: (msg: string, category?: string): void => log('WARN', msg, category),
  error: (msg: string, category?: string): void => log('ERROR', msg, category),
};
