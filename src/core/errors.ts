/**
 * Error types raised by the runner
 *
 * Errors thrown from inside a task body are never wrapped in one of these;
 * they reach the caller of `Executor.execute` unchanged.
 */

import type { ErrorDetails } from '../types';

export class RunnerError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(code: string, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  toDetails(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * A dotted name did not resolve to a task
 */
export class TaskNotFoundError extends RunnerError {
  readonly taskName: string;

  constructor(taskName: string, reason?: string) {
    super(
      'TASK_NOT_FOUND',
      reason ? `Task not found: '${taskName}' (${reason})` : `Task not found: '${taskName}'`,
      { taskName }
    );
    this.taskName = taskName;
  }
}

/**
 * The root task of an execution produced no result because deduplication
 * removed it (it already ran this session)
 */
export class MissingResultError extends RunnerError {
  readonly taskName: string;

  constructor(taskName: string) {
    super(
      'MISSING_RESULT',
      `No result for '${taskName}': it already ran this session and was deduplicated`,
      { taskName }
    );
    this.taskName = taskName;
  }
}

/**
 * Arguments handed to a task do not match what the task accepts
 */
export class TaskInvocationError extends RunnerError {
  readonly taskName: string;

  constructor(taskName: string, message: string, context?: Record<string, unknown>) {
    super('INVOCATION_ERROR', `${taskName}: ${message}`, { taskName, ...context });
    this.taskName = taskName;
  }
}

export class CollectionError extends RunnerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('COLLECTION_ERROR', message, context);
  }
}

export class ConfigError extends RunnerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, context);
  }
}

/**
 * Normalize anything thrown into loggable details
 */
export function toErrorDetails(error: unknown): ErrorDetails {
  if (error instanceof RunnerError) {
    return error.toDetails();
  }

  if (error instanceof Error) {
    return {
      code: 'UNKNOWN_ERROR',
      message: error.message,
    };
  }

  return {
    code: 'UNKNOWN_ERROR',
    message: 'An unknown error occurred',
  };
}

/**
 * A shell command run through `Context.run` exited unsuccessfully
 */
export class CommandFailedError extends RunnerError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    command: string,
    exitCode: number | null,
    output: { stdout: string; stderr: string; reason?: string }
  ) {
    const reason = output.reason ?? `exited with code ${exitCode}`;
    super('COMMAND_FAILED', `Command '${command}' ${reason}`, { command, exitCode });
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = output.stdout;
    this.stderr = output.stderr;
  }
}
