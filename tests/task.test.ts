/**
 * Tests for Task
 */

import { describe, test, expect } from 'vitest';
import { Task, task, ctask } from '../src/core/task';
import { Context } from '../src/core/context';
import { CollectionError, TaskInvocationError } from '../src/core/errors';

describe('Task', () => {
  describe('declaration', () => {
    test('should take its name from the body function', () => {
      // Method shorthand keeps the name through transpilation
      const bodies = {
        compile() {
          return 'ok';
        },
      };
      const t = task(bodies.compile);

      expect(t.name).toBe('compile');
      expect(t.pre).toEqual([]);
      expect(t.contextualized).toBe(false);
      expect(t.called).toBe(false);
    });

    test('should prefer an explicit name', () => {
      const t = ctask(() => undefined, { name: 'doctree', pre: ['clean'] });

      expect(t.name).toBe('doctree');
      expect(t.pre).toEqual(['clean']);
      expect(t.contextualized).toBe(true);
    });

    test('should reject anonymous bodies without a name', () => {
      expect(() => task(() => undefined)).toThrow(CollectionError);
    });

    test('should reject dotted names', () => {
      expect(() => task(() => undefined, { name: 'docs.build' })).toThrow(CollectionError);
    });

    test('should not share the pre list it was declared with', () => {
      const pre = ['a'];
      const t = task(() => undefined, { name: 't', pre });

      pre.push('b');

      expect(t.pre).toEqual(['a']);
    });
  });

  describe('invoke', () => {
    test('should pass kwargs to a plain task and mark it called', () => {
      const t = task(({ who }) => `hello ${String(who)}`, { name: 'greet' });

      expect(t.invoke(undefined, { who: 'world' })).toBe('hello world');
      expect(t.called).toBe(true);
    });

    test('should pass the context first to a contextualized task', () => {
      const t = ctask((context, kwargs) => `${String(context.get('env'))}:${String(kwargs.n)}`, {
        name: 'show',
      });

      expect(t.invoke(new Context({ env: 'dev' }), { n: 1 })).toBe('dev:1');
    });

    test('should refuse to run a contextualized task without a context', () => {
      const t = ctask(() => undefined, { name: 'needs' });

      expect(() => t.invoke(undefined, {})).toThrow(TaskInvocationError);
      expect(t.called).toBe(false);
    });

    test('should refuse a context for a plain task', () => {
      const t = task(() => undefined, { name: 'plain' });

      expect(() => t.invoke(new Context(), {})).toThrow(
        'plain: task does not take a context'
      );
    });

    test('should reject keywords outside the declared params', () => {
      const t = task(() => undefined, { name: 'clean', params: ['force'] });

      expect(() => t.invoke(undefined, { force: true, target: 'x', level: 2 })).toThrow(
        "clean: unexpected keyword arguments 'target', 'level'"
      );
      expect(t.called).toBe(false);
    });

    test('should leave called false when the body throws', () => {
      const t = task(
        () => {
          throw new Error('broken');
        },
        { name: 'broken' }
      );

      expect(() => t.invoke(undefined, {})).toThrow('broken');
      expect(t.called).toBe(false);
    });
  });

  describe('copies', () => {
    test('should produce uncalled copies that keep the declaration', () => {
      const t = task(() => 1, { name: 'one', pre: ['zero'], aliases: ['uno'], help: 'first' });
      t.invoke(undefined, {});

      const renamed = t.withName('first');
      const fresh = t.fresh();

      expect(renamed).toBeInstanceOf(Task);
      expect(renamed.name).toBe('first');
      expect(renamed.pre).toEqual(['zero']);
      expect(renamed.aliases).toEqual(['uno']);
      expect(renamed.help).toBe('first');
      expect(renamed.called).toBe(false);
      expect(fresh.name).toBe('one');
      expect(fresh.called).toBe(false);
      expect(t.called).toBe(true);
    });
  });
});
