/**
 * Tests for Context
 */

import { describe, test, expect } from 'vitest';
import { Context } from '../src/core/context';

describe('Context', () => {
  describe('clone', () => {
    test('should produce an equal but independent copy', () => {
      const original = new Context({ env: 'dev', build: { target: 'es2020', flags: ['a'] } });
      const copy = original.clone();

      copy.update({ env: 'prod' });
      const build = copy.get('build');
      if (build && typeof build === 'object' && 'flags' in build && Array.isArray(build.flags)) {
        build.flags.push('b');
      }

      expect(original.toJSON()).toEqual({ env: 'dev', build: { target: 'es2020', flags: ['a'] } });
      expect(copy.toJSON()).toEqual({ env: 'prod', build: { target: 'es2020', flags: ['a', 'b'] } });
    });

    test('should not copy the mapping it was built from by reference', () => {
      const values = { nested: { count: 1 } };
      const context = new Context(values);

      values.nested.count = 2;

      expect(context.toJSON()).toEqual({ nested: { count: 1 } });
    });
  });

  describe('update', () => {
    test('should add new keys and override existing ones', () => {
      const context = new Context({ env: 'dev', region: 'eu' });

      context.update({ env: 'prod', replicas: 2 });

      expect(context.toJSON()).toEqual({ env: 'prod', region: 'eu', replicas: 2 });
    });

    test('should store a __proto__ key as an ordinary entry', () => {
      const context = new Context({ env: 'dev' });

      context.update(JSON.parse('{"__proto__": {"polluted": true}}'));

      expect(context.has('__proto__')).toBe(true);
      expect(context.get('__proto__')).toEqual({ polluted: true });
      expect(context.get('polluted')).toBeUndefined();
      expect(context.keys()).toEqual(['env', '__proto__']);
    });

    test('should replace nested mappings rather than merging them', () => {
      const context = new Context({ db: { host: 'localhost', port: 5432 } });

      context.update({ db: { host: 'db.internal' } });

      expect(context.get('db')).toEqual({ host: 'db.internal' });
    });
  });

  describe('accessors', () => {
    test('should report keys and membership', () => {
      const context = new Context({ a: 1 });
      context.set('b', undefined);

      expect(context.keys()).toEqual(['a', 'b']);
      expect(context.has('b')).toBe(true);
      expect(context.has('c')).toBe(false);
      expect(context.get('c')).toBeUndefined();
    });
  });
});
