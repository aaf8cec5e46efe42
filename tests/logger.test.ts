/**
 * Tests for Logger
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger, isLogLevel } from '../src/utils/logger';

describe('Logger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pretask-log-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function readLines(file: string): Array<Record<string, unknown>> {
    return readFileSync(file, 'utf-8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));
  }

  test('should write JSON lines at or above the configured level', () => {
    const file = join(dir, 'nested', 'run.log');
    const logger = new Logger({ level: 'warn', console: false, file });

    logger.info('hidden');
    logger.warn('shown', { task: 'build' });
    logger.critical('also shown');

    const lines = readLines(file);
    expect(lines.map((l) => l.message)).toEqual(['shown', 'also shown']);
    expect(lines[0].level).toBe('warn');
    expect(lines[0].task).toBe('build');
  });

  test('should log task events at debug, failures at error', () => {
    const file = join(dir, 'events.log');
    const logger = new Logger({ level: 'debug', console: false, file });

    logger.taskEvent('started', 'build');
    logger.taskEvent('failed', 'build', { error: 'boom' });

    const lines = readLines(file);
    expect(lines.map((l) => [l.level, l.message, l.task])).toEqual([
      ['debug', 'task_started', 'build'],
      ['error', 'task_failed', 'build'],
    ]);
    expect(lines[1].error).toBe('boom');
  });

  test('should write console output to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger({ level: 'info', console: true });

    logger.debug('hidden');
    logger.info('visible', { n: 1 });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toContain('visible');
  });

  test('should recognize log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('critical')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
