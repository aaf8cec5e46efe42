/**
 * Executor - runs a named task after its declared prerequisites
 */

import type { Kwargs } from '../types';
import type { Collection } from './collection';
import { Context } from './context';
import { MissingResultError, toErrorDetails } from './errors';
import type { Task } from './task';
import { getLogger } from '../utils/logger';
import { getMetrics } from '../utils/metrics';

export class Executor {
  readonly collection: Collection;
  readonly context: Context;

  /**
   * The collection resolves task names and carries the "already called"
   * state for the session. A clone of `context`, updated with the task's
   * collection configuration, is handed to every contextualized task.
   */
  constructor(collection: Collection, context: Context = new Context()) {
    this.collection = collection;
    this.context = context;
  }

  /**
   * Execute a named task, preceded by its prerequisites.
   *
   * Only the root's own `pre` list is expanded; prerequisites of
   * prerequisites are not. The same `kwargs` object is handed to every task
   * in the chain. With `dedupe` on, repeated names collapse to their first
   * occurrence and tasks already called this session are dropped.
   *
   * @returns The root task's return value
   * @throws TaskNotFoundError when a name does not resolve
   * @throws MissingResultError when dedupe dropped the root itself
   */
  execute(name: string, kwargs: Kwargs = {}, dedupe: boolean = true): unknown {
    const logger = getLogger();
    const metrics = getMetrics();

    const task = this.collection.lookup(name);
    const { pending: taskNames, skipped } = this.plan(name, dedupe);
    for (const taskName of skipped) {
      metrics.recordSkip(taskName);
      logger.taskEvent('skipped', taskName, { reason: 'already called' });
    }

    const results = new Map<Task, unknown>();
    for (const taskName of taskNames) {
      const current = this.collection.lookup(taskName);
      const context = this.contextFor(current, taskName);

      logger.taskEvent('started', taskName, { contextualized: current.contextualized });
      const record = metrics.startTask(taskName);

      let result: unknown;
      try {
        result = current.invoke(context, { ...kwargs });
      } catch (error) {
        const details = toErrorDetails(error);
        metrics.failTask(record, details.message);
        logger.taskEvent('failed', taskName, { code: details.code, error: details.message });
        throw error;
      }

      metrics.completeTask(record);
      logger.taskEvent('completed', taskName);
      results.set(current, result);
    }

    if (!results.has(task)) {
      throw new MissingResultError(name);
    }
    return results.get(task);
  }

  /**
   * The ordered list of task names `execute` would run right now
   */
  expand(name: string, dedupe: boolean = true): string[] {
    return this.plan(name, dedupe).pending;
  }

  private plan(name: string, dedupe: boolean): { pending: string[]; skipped: string[] } {
    const logger = getLogger();
    const task = this.collection.lookup(name);
    logger.debug('Examining top level task', { task: task.name, lookup: name });

    const taskNames = [...task.pre, name];
    logger.debug('Task list, including pre-tasks', { tasks: taskNames });

    if (!dedupe) {
      logger.debug('Deduplication is disabled, running the full list');
      return { pending: taskNames, skipped: [] };
    }

    // Order-preserving compaction; first occurrence wins
    const compact: string[] = [];
    for (const taskName of taskNames) {
      if (!compact.includes(taskName)) {
        compact.push(taskName);
      }
    }
    logger.debug('Task list, duplicates removed', { tasks: compact });

    const pending: string[] = [];
    const skipped: string[] = [];
    for (const taskName of compact) {
      if (this.collection.lookup(taskName).called) {
        skipped.push(taskName);
      } else {
        pending.push(taskName);
      }
    }
    logger.debug('Task list, already-called tasks removed', { tasks: pending });

    return { pending, skipped };
  }

  private contextFor(task: Task, taskName: string): Context | undefined {
    if (!task.contextualized) {
      return undefined;
    }
    const context = this.context.clone();
    context.update(this.collection.configuration(taskName));
    return context;
  }
}
