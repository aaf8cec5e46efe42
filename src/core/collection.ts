/**
 * Collection - name registry for tasks and nested namespaces
 */

import type { ContextValues } from '../types';
import { CollectionError, TaskNotFoundError } from './errors';
import { Task } from './task';

export class Collection {
  readonly name?: string;
  private tasks: Map<string, Task>;
  private aliases: Map<string, string>;
  private collections: Map<string, Collection>;
  private defaultTask: string | null;
  private config: ContextValues;

  constructor(name?: string, items: Array<Task | Collection> = []) {
    this.name = name;
    this.tasks = new Map();
    this.aliases = new Map();
    this.collections = new Map();
    this.defaultTask = null;
    this.config = {};

    for (const item of items) {
      if (item instanceof Collection) {
        this.addCollection(item);
      } else {
        this.addTask(item);
      }
    }
  }

  /**
   * Build a collection from a loaded tasks module. An exported `ns` or
   * `namespace` collection (or a default-exported one) is used as-is;
   * otherwise every exported Task is added under its own name.
   */
  static fromModule(moduleExports: Record<string, unknown>, name?: string): Collection {
    for (const key of ['ns', 'namespace', 'default']) {
      const value = moduleExports[key];
      if (value instanceof Collection) {
        return value;
      }
    }

    const collection = new Collection(name);
    for (const value of Object.values(moduleExports)) {
      if (value instanceof Task) {
        collection.addTask(value);
      }
    }
    return collection;
  }

  /**
   * Register a task. The collection keeps its own uncalled copy, so the
   * "already called" state belongs to this collection's session.
   */
  addTask(task: Task, name?: string): Task {
    const registered = task.withName(name ?? task.name);

    this.assertFree(registered.name);
    for (const alias of registered.aliases) {
      this.assertFree(alias);
    }
    if (registered.isDefault && this.defaultTask !== null) {
      throw new CollectionError(
        `'${registered.name}' cannot be the default task: '${this.defaultTask}' already is`,
        { taskName: registered.name, defaultTask: this.defaultTask }
      );
    }

    this.tasks.set(registered.name, registered);
    for (const alias of registered.aliases) {
      this.aliases.set(alias, registered.name);
    }
    if (registered.isDefault) {
      this.defaultTask = registered.name;
    }
    return registered;
  }

  addCollection(collection: Collection, name?: string): void {
    const key = name ?? collection.name;
    if (!key) {
      throw new CollectionError('Nested collections need a name');
    }
    if (key.includes('.')) {
      throw new CollectionError(`Collection name cannot contain '.': '${key}'`);
    }
    this.assertFree(key);
    this.collections.set(key, collection);
  }

  /**
   * Merge options into this collection's own configuration
   */
  configure(options: ContextValues): void {
    Object.assign(this.config, options);
  }

  /**
   * Resolve a dotted task path. An empty path, or the name of a nested
   * collection, selects that collection's default task.
   */
  lookup(name: string): Task {
    const task = this.resolve(name);
    if (!task) {
      throw new TaskNotFoundError(name);
    }
    return task;
  }

  has(name: string): boolean {
    return this.resolve(name) !== undefined;
  }

  /**
   * Configuration that applies to the task at `name`. Every collection on
   * the path contributes its own options; the one closer to the root wins
   * on conflict.
   */
  configuration(name?: string): ContextValues {
    if (!name) {
      return { ...this.config };
    }

    const dot = name.indexOf('.');
    const head = dot === -1 ? name : name.slice(0, dot);
    const rest = dot === -1 ? null : name.slice(dot + 1);
    let inner: ContextValues;

    if (rest !== null) {
      const sub = this.collections.get(head);
      if (!sub) {
        throw new TaskNotFoundError(name, `no collection named '${head}'`);
      }
      inner = sub.configuration(rest);
    } else if (this.tasks.has(head) || this.aliases.has(head)) {
      inner = {};
    } else {
      const sub = this.collections.get(head);
      if (!sub) {
        throw new TaskNotFoundError(name);
      }
      inner = sub.configuration();
    }

    return { ...inner, ...this.config };
  }

  /**
   * All tasks reachable from this collection, keyed by dotted path
   */
  entries(): Array<[string, Task]> {
    const result: Array<[string, Task]> = [];
    for (const [name, task] of this.tasks) {
      result.push([name, task]);
    }
    for (const [prefix, sub] of this.collections) {
      for (const [name, task] of sub.entries()) {
        result.push([`${prefix}.${name}`, task]);
      }
    }
    return result.sort(([a], [b]) => a.localeCompare(b));
  }

  taskNames(): string[] {
    return this.entries().map(([name]) => name);
  }

  getDefaultTaskName(): string | null {
    return this.defaultTask;
  }

  private resolve(path: string): Task | undefined {
    if (!path) {
      return this.defaultTask === null ? undefined : this.tasks.get(this.defaultTask);
    }

    const dot = path.indexOf('.');
    if (dot !== -1) {
      return this.collections.get(path.slice(0, dot))?.resolve(path.slice(dot + 1));
    }

    const direct = this.tasks.get(path);
    if (direct) {
      return direct;
    }
    const aliased = this.aliases.get(path);
    if (aliased !== undefined) {
      return this.tasks.get(aliased);
    }
    return this.collections.get(path)?.resolve('');
  }

  private assertFree(name: string): void {
    if (this.tasks.has(name) || this.aliases.has(name) || this.collections.has(name)) {
      throw new CollectionError(`Name already registered in collection: '${name}'`, {
        name,
        collection: this.name,
      });
    }
  }
}
