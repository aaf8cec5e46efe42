/**
 * Context - configuration handed to contextualized tasks
 */

import type { ContextValues } from '../types';
import { runCommand } from './shell';
import type { RunOptions, RunResult } from './shell';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copy plain objects and arrays recursively; anything else (class
 * instances, functions, primitives) is shared by reference
 */
function copyValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(copyValue);
  }
  if (isPlainObject(value)) {
    return copyRecord(value);
  }
  return value;
}

function copyRecord(record: Record<string, unknown>): ContextValues {
  return Object.fromEntries(Object.entries(record).map(([k, v]) => [k, copyValue(v)]));
}

export class Context {
  private values: ContextValues;

  constructor(values: ContextValues = {}) {
    this.values = copyRecord(values);
  }

  /**
   * Independent copy: mutating either side never shows up in the other
   */
  clone(): Context {
    return new Context(this.values);
  }

  /**
   * Merge `mapping` into this context in place; its keys win on conflict
   */
  update(mapping: ContextValues): void {
    for (const [key, value] of Object.entries(mapping)) {
      this.define(key, copyValue(value));
    }
  }

  get(key: string): unknown {
    return this.values[key];
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.values, key);
  }

  set(key: string, value: unknown): void {
    this.define(key, value);
  }

  keys(): string[] {
    return Object.keys(this.values);
  }

  toJSON(): ContextValues {
    return copyRecord(this.values);
  }

  /**
   * Run a shell command, waiting for it to exit
   *
   * @example
   * ```ts
   * ctask((context) => context.run(`tree ${String(context.get('target'))}`), { name: 'tree' });
   * ```
   */
  run(command: string, options?: RunOptions): RunResult {
    return runCommand(command, options);
  }

  // Keys such as `__proto__` from parsed YAML are stored as ordinary entries
  private define(key: string, value: unknown): void {
    Object.defineProperty(this.values, key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
}
