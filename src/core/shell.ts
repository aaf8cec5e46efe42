/**
 * Synchronous shell command execution for task bodies
 */

import { spawnSync } from 'child_process';
import { CommandFailedError } from './errors';
import { getLogger } from '../utils/logger';

export interface RunOptions {
  /**
   * Return a non-zero exit instead of throwing
   */
  warn?: boolean;
  /**
   * Capture output without echoing it
   */
  hide?: boolean;
  cwd?: string;
  env?: Record<string, string>;
}

export interface RunResult {
  command: string;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  ok: boolean;
  durationMs: number;
}

const MAX_BUFFER = 10 * 1024 * 1024;

/**
 * Run `command` through the system shell and wait for it to finish.
 * Output is captured and, unless `hide` is set, echoed once the command exits.
 *
 * @throws CommandFailedError on a non-zero exit (unless `warn`) or when the
 * shell could not be started
 */
export function runCommand(command: string, options: RunOptions = {}): RunResult {
  const logger = getLogger();
  logger.debug('Running command', { command, cwd: options.cwd });

  const startTime = Date.now();
  const child = spawnSync(command, {
    shell: true,
    cwd: options.cwd,
    env: options.env ? { ...process.env, ...options.env } : process.env,
    encoding: 'utf-8',
    maxBuffer: MAX_BUFFER,
  });

  const stdout = child.stdout ?? '';
  const stderr = child.stderr ?? '';

  if (child.error) {
    throw new CommandFailedError(command, null, {
      stdout,
      stderr,
      reason: `could not be run: ${child.error.message}`,
    });
  }

  if (!options.hide) {
    process.stdout.write(stdout);
    process.stderr.write(stderr);
  }

  const result: RunResult = {
    command,
    stdout,
    stderr,
    exitCode: child.status,
    ok: child.status === 0,
    durationMs: Date.now() - startTime,
  };
  logger.debug('Command finished', {
    command,
    exitCode: result.exitCode,
    signal: child.signal,
    durationMs: result.durationMs,
  });

  if (!result.ok && !options.warn) {
    throw new CommandFailedError(command, child.status, {
      stdout,
      stderr,
      reason: child.signal ? `was killed by ${child.signal}` : undefined,
    });
  }
  return result;
}
