/**
 * Core modules export
 */

export { Context } from './context';
export { runCommand } from './shell';
export type { RunOptions, RunResult } from './shell';
export { Task, task, ctask } from './task';
export type { TaskBody, ContextualTaskBody, TaskImpl } from './task';
export { Collection } from './collection';
export { Executor } from './executor';
export { Validator } from './validator';
export type { ValidationRule, RuleOutcome } from './validator';
export {
  RunnerError,
  TaskNotFoundError,
  MissingResultError,
  TaskInvocationError,
  CollectionError,
  ConfigError,
  CommandFailedError,
  toErrorDetails,
} from './errors';
