import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { formatLogLine, logger, setVerbose, isVerbose, LOG_COLORS } from './logger.js';

describe('logger', () => {
  let writes: string[];

  beforeEach(() => {
    writes = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    setVerbose(false);
    vi.restoreAllMocks();
  });

  it('formats level, category and message', () => {
    expect(formatLogLine('WARN', 'slow write', 'storage', '12:00:00.000')).toBe(
      '[12:00:00.000] [WARN] [storage] slow write'
    );
    expect(formatLogLine('INFO', 'ready', undefined, '12:00:00.000')).toBe('[12:00:00.000] [INFO] ready');
  });

  it('hides INFO unless verbose', () => {
    logger.info('hidden');
    expect(writes).toEqual([]);

    setVerbose(true);
    expect(isVerbose()).toBe(true);
    logger.info('shown', 'engine');
    expect(writes).toHaveLength(1);
    expect(writes[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[INFO\] \[engine\] shown\n$/);
  });

  it('colors warnings and errors', () => {
    logger.warn('careful');
    logger.error('broken');
    expect(writes[0].startsWith(LOG_COLORS.WARN)).toBe(true);
    expect(writes[1].startsWith(LOG_COLORS.ERROR)).toBe(true);
    expect(writes[1].endsWith(LOG_COLORS.RESET + '\n')).toBe(true);
  });
});
