import fs from 'fs';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger } from '../src/main/logger';

/** Log file lines containing `text`; other test files log to the same file. */
function linesWith(text: string): string[] {
  return fs
    .readFileSync(logger.getLogPath(), 'utf-8')
    .split('\n')
    .filter((line) => line.includes(text));
}

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('appends level-tagged lines to the log file', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    logger.warn('[test] disk almost full', { freeMb: 12 });

    const lines = linesWith('[test] disk almost full');
    expect(lines[lines.length - 1]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN\] \[test\] disk almost full \[\{"freeMb":12\}\]$/);
  });

  it('creates the log directory only once', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    logger.log('[test] first');
    const mkdir = vi.spyOn(fs, 'mkdirSync');

    logger.log('[test] second');
    logger.log('[test] third');

    expect(mkdir).not.toHaveBeenCalled();
    const lines = linesWith('[test] third');
    expect(lines[lines.length - 1]).toMatch(/\[INFO\] \[test\] third$/);
  });
});
