/**
 * Command log
 *
 * Appends one JSONL entry per engine call to logs/commands.log, keeping
 * the file bounded: once it grows past maxLines, only the newest
 * maxLines/2 entries are kept.
 */

import { join } from 'path';
import { appendLine, atomicWriteFile, readLines } from '../utils/fs.js';
import { isRecord } from '../storage/codec.js';
import { DEFAULT_LOG_MAX_LINES } from '../types/index.js';

export interface CommandLogEntry {
  /** ISO timestamp */
  ts: string;
  op: string;
  args: Record<string, unknown>;
  ok: boolean;
  /** Wall time in milliseconds */
  ms: number;
  error?: string;
}

export interface CommandLogConfig {
  logPath: string;
  maxLines?: number;
}

export function commandLogPath(dataDir: string): string {
  return join(dataDir, 'logs', 'commands.log');
}

function parseEntry(line: string): CommandLogEntry | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  if (
    !isRecord(value) ||
    typeof value.ts !== 'string' ||
    typeof value.op !== 'string' ||
    !isRecord(value.args) ||
    typeof value.ok !== 'boolean' ||
    typeof value.ms !== 'number'
  ) {
    return null;
  }
  const entry: CommandLogEntry = { ts: value.ts, op: value.op, args: value.args, ok: value.ok, ms: value.ms };
  if (typeof value.error === 'string') {
    entry.error = value.error;
  }
  return entry;
}

export class CommandLog {
  readonly logPath: string;
  readonly maxLines: number;
  /** Lines in the file; counted on first append */
  private lineCount: number | null = null;
  private pendingWrites: Promise<void> = Promise.resolve();

  constructor(config: CommandLogConfig) {
    this.logPath = config.logPath;
    this.maxLines = config.maxLines ?? DEFAULT_LOG_MAX_LINES;
  }

  /**
   * Append an entry. Writes are chained so concurrent appends keep their
   * order; a failure rejects this call only.
   */
  append(entry: CommandLogEntry): Promise<void> {
    const line = JSON.stringify(entry);
    const write = this.pendingWrites.then(() => this.write(line));
    this.pendingWrites = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  /** Last n well-formed entries, oldest first */
  async tail(n: number): Promise<CommandLogEntry[]> {
    const entries: CommandLogEntry[] = [];
    for (const line of await readLines(this.logPath)) {
      const entry = parseEntry(line);
      if (entry) entries.push(entry);
    }
    return n > 0 ? entries.slice(-n) : [];
  }

  async clear(): Promise<void> {
    await atomicWriteFile(this.logPath, '');
    this.lineCount = 0;
  }

  private async write(line: string): Promise<void> {
    if (this.lineCount === null) {
      this.lineCount = (await readLines(this.logPath)).length;
    }
    await appendLine(this.logPath, line);
    this.lineCount++;

    if (this.lineCount > this.maxLines) {
      await this.rotate();
    }
  }

  private async rotate(): Promise<void> {
    const lines = await readLines(this.logPath);
    const kept = lines.slice(-Math.floor(this.maxLines / 2));
    await atomicWriteFile(this.logPath, kept.length > 0 ? kept.join('\n') + '\n' : '');
    this.lineCount = kept.length;
  }
}
