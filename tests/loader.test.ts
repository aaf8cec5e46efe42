/**
 * Tests for tasks module loading and keyword parsing
 */

import { describe, test, expect } from 'vitest';
import { loadTasksModule, parseKwargs } from '../src/loader';
import { Executor } from '../src/core/executor';
import { Context } from '../src/core/context';
import { ConfigError } from '../src/core/errors';

describe('loadTasksModule', () => {
  test('should build a collection from exported tasks', async () => {
    const collection = await loadTasksModule('tests/fixtures/tasks.ts');

    expect(collection.taskNames()).toEqual(['build', 'clean']);
    expect(collection.lookup('build').name).toBe('build');
    expect(collection.lookup('clean').contextualized).toBe(false);
    expect(collection.lookup('build').pre).toEqual(['clean']);
    expect(collection.lookup('build').help).toBe('Compile the project');
  });

  test('should give a fresh session on every load', async () => {
    const first = await loadTasksModule('tests/fixtures/tasks.ts');
    const executor = new Executor(first, new Context({ target: 'dist' }));

    expect(executor.execute('build')).toBe('built dist');
    expect(first.lookup('clean').called).toBe(true);

    const second = await loadTasksModule('tests/fixtures/tasks.ts');
    expect(second.lookup('clean').called).toBe(false);
  });

  test('should use an exported namespace collection', async () => {
    const collection = await loadTasksModule('tests/fixtures/namespace.ts');

    expect(collection.taskNames()).toEqual(['docs.api', 'docs.tree']);
    expect(collection.lookup('docs').name).toBe('api');
    expect(collection.configuration('docs.tree')).toEqual({ format: 'html' });
  });

  test('should fail for a missing file', async () => {
    await expect(loadTasksModule('tests/fixtures/absent.ts')).rejects.toThrow(ConfigError);
  });

  test('should fail for a module without tasks', async () => {
    await expect(loadTasksModule('tests/fixtures/empty.ts')).rejects.toThrow('No tasks found');
  });
});

describe('parseKwargs', () => {
  test('should read values as YAML scalars', () => {
    expect(parseKwargs(['target=dist', 'count=3', 'debug=false', 'name='])).toEqual({
      target: 'dist',
      count: 3,
      debug: false,
      name: null,
    });
  });

  test('should treat a bare key as a true flag', () => {
    expect(parseKwargs(['force'])).toEqual({ force: true });
  });

  test('should keep everything after the first equals sign', () => {
    expect(parseKwargs(['expr=a=b'])).toEqual({ expr: 'a=b' });
  });

  test('should reject an empty key', () => {
    expect(() => parseKwargs(['=value'])).toThrow("Invalid keyword argument: '=value'");
  });
});
