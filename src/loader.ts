/**
 * Tasks module loading and CLI keyword parsing
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import type { Kwargs } from './types';
import { Collection } from './core/collection';
import { ConfigError } from './core/errors';
import { getLogger } from './utils/logger';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

/**
 * Import a tasks module and turn its exports into a Collection
 */
export async function loadTasksModule(file: string): Promise<Collection> {
  const path = resolve(file);
  if (!existsSync(path)) {
    throw new ConfigError(`Tasks file not found: ${path}`, { path });
  }

  const loaded: unknown = await import(path);
  if (!isRecord(loaded)) {
    throw new ConfigError(`Tasks file did not export anything usable: ${path}`, { path });
  }

  const collection = Collection.fromModule(loaded);
  getLogger().debug('Loaded tasks module', { path, tasks: collection.taskNames() });

  if (collection.taskNames().length === 0) {
    throw new ConfigError(`No tasks found in ${path}`, { path });
  }
  return collection;
}

/**
 * Turn `key=value` pairs into keyword arguments. Values are read as YAML
 * scalars, so `count=3` gives a number; a bare `key` gives `true`.
 */
export function parseKwargs(pairs: string[]): Kwargs {
  const kwargs: Kwargs = {};

  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    const key = (eq === -1 ? pair : pair.slice(0, eq)).trim();
    if (!key) {
      throw new ConfigError(`Invalid keyword argument: '${pair}'`);
    }
    kwargs[key] = eq === -1 ? true : parseYaml(pair.slice(eq + 1));
  }

  return kwargs;
}
