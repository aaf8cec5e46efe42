/**
 * Task - a named unit of work with single-level prerequisites
 */

import type { Kwargs, TaskOptions } from '../types';
import type { Context } from './context';
import { CollectionError, TaskInvocationError } from './errors';

export type TaskBody = (kwargs: Kwargs) => unknown;
export type ContextualTaskBody = (context: Context, kwargs: Kwargs) => unknown;

export type TaskImpl =
  | { contextualized: false; body: TaskBody }
  | { contextualized: true; body: ContextualTaskBody };

export class Task {
  readonly name: string;
  readonly pre: readonly string[];
  readonly aliases: readonly string[];
  readonly isDefault: boolean;
  readonly help?: string;
  readonly params?: readonly string[];
  private readonly impl: TaskImpl;
  private wasCalled: boolean;

  constructor(impl: TaskImpl, options: TaskOptions & { name: string }) {
    if (!options.name) {
      throw new CollectionError('Task name cannot be empty');
    }
    if (options.name.includes('.')) {
      throw new CollectionError(`Task name cannot contain '.': '${options.name}'`, {
        taskName: options.name,
      });
    }

    this.impl = impl;
    this.name = options.name;
    this.pre = [...(options.pre ?? [])];
    this.aliases = [...(options.aliases ?? [])];
    this.isDefault = options.isDefault ?? false;
    this.help = options.help;
    this.params = options.params ? [...options.params] : undefined;
    this.wasCalled = false;
  }

  get contextualized(): boolean {
    return this.impl.contextualized;
  }

  /**
   * Whether the task has been invoked successfully in this session
   */
  get called(): boolean {
    return this.wasCalled;
  }

  /**
   * Run the task body. Contextualized tasks take the context as their first
   * argument; plain tasks must not be handed one. Errors thrown by the body
   * propagate as-is and leave `called` untouched.
   */
  invoke(context: Context | undefined, kwargs: Kwargs): unknown {
    this.checkKwargs(kwargs);

    let result: unknown;
    if (this.impl.contextualized) {
      if (!context) {
        throw new TaskInvocationError(this.name, 'contextualized task requires a context');
      }
      result = this.impl.body(context, kwargs);
    } else {
      if (context) {
        throw new TaskInvocationError(this.name, 'task does not take a context');
      }
      result = this.impl.body(kwargs);
    }

    this.wasCalled = true;
    return result;
  }

  /**
   * Uncalled copy of this task registered under another name
   */
  withName(name: string): Task {
    return new Task(this.impl, {
      name,
      pre: [...this.pre],
      aliases: [...this.aliases],
      isDefault: this.isDefault,
      help: this.help,
      params: this.params ? [...this.params] : undefined,
    });
  }

  /**
   * Uncalled copy of this task
   */
  fresh(): Task {
    return this.withName(this.name);
  }

  toString(): string {
    return `<Task '${this.name}'>`;
  }

  private checkKwargs(kwargs: Kwargs): void {
    if (!this.params) {
      return;
    }
    const accepted = this.params;
    const unexpected = Object.keys(kwargs).filter((key) => !accepted.includes(key));
    if (unexpected.length > 0) {
      throw new TaskInvocationError(
        this.name,
        `unexpected keyword argument${unexpected.length > 1 ? 's' : ''} ${unexpected
          .map((key) => `'${key}'`)
          .join(', ')}`,
        { unexpected }
      );
    }
  }
}

function resolveName(body: { name: string }, options: TaskOptions): string {
  const name = options.name ?? body.name;
  if (!name) {
    throw new CollectionError('Anonymous task bodies need an explicit name');
  }
  return name;
}

/**
 * Declare a plain task. Without `options.name` the body function's own name
 * is used, which bundlers and transpilers may rewrite; pass `name` for tasks
 * modules that are compiled.
 *
 * @example
 * ```ts
 * export const build = task(({ target }) => make(target), { name: 'build', pre: ['clean'] });
 * ```
 */
export function task(body: TaskBody, options: TaskOptions = {}): Task {
  return new Task(
    { contextualized: false, body },
    { ...options, name: resolveName(body, options) }
  );
}

/**
 * Declare a task that takes a Context as its first argument
 */
export function ctask(body: ContextualTaskBody, options: TaskOptions = {}): Task {
  return new Task(
    { contextualized: true, body },
    { ...options, name: resolveName(body, options) }
  );
}
