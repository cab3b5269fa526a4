import { describe, it, expect, beforeEach } from 'vitest';
import { TtlCache, cacheKey } from '../../src/tools/shared/cache.js';
import { createManualClock, type ManualClock } from '../utils/test-context.js';

describe('TTL Cache', () => {
  let clock: ManualClock;
  let cache: TtlCache<string>;

  beforeEach(() => {
    clock = createManualClock();
    cache = new TtlCache<string>(clock.now);
  });

  describe('get/set', () => {
    it('should return undefined for unknown keys', () => {
      expect(cache.get('missing', 60)).toBeUndefined();
    });

    it('should serve a fresh value even with a zero TTL', () => {
      cache.set('k', 'v');

      expect(cache.get('k', 0)).toBe('v');
    });

    it('should evict only the expired entry', () => {
      cache.set('old', '1');
      clock.advance(5_000);
      cache.set('new', '2');
      clock.advance(5_001);

      expect(cache.size()).toBe(2);
      expect(cache.get('old', 10)).toBeUndefined();
      expect(cache.size()).toBe(1);
      expect(cache.get('new', 10)).toBe('2');
    });

    it('should serve a value up to and including the TTL', () => {
      cache.set('k', 'v');
      clock.advance(10_000);

      expect(cache.get('k', 10)).toBe('v');
    });

    it('should expire and evict a value older than the TTL', () => {
      cache.set('k', 'v');
      clock.advance(10_001);

      expect(cache.get('k', 10)).toBeUndefined();
      expect(cache.size()).toBe(0);
    });

    it('should judge freshness by the TTL of the reader', () => {
      cache.set('k', 'v');
      clock.advance(6_000);

      expect(cache.get('k', 60)).toBe('v');
      expect(cache.get('k', 5)).toBeUndefined();
      expect(cache.get('k', 60)).toBeUndefined();
    });

    it('should restart the age when a key is overwritten', () => {
      cache.set('k', 'old');
      clock.advance(8_000);
      cache.set('k', 'new');
      clock.advance(8_000);

      expect(cache.get('k', 10)).toBe('new');
    });

    it('should drop every entry on clear', () => {
      cache.set('a', '1');
      cache.set('b', '2');
      cache.clear();

      expect(cache.size()).toBe(0);
      expect(cache.get('a', 60)).toBeUndefined();
    });
  });

  describe('cacheKey', () => {
    it('should prefix the operation name', () => {
      expect(cacheKey('list_models', { page: 1 })).toBe('list_models:{"page":1}');
    });

    it('should not depend on parameter order', () => {
      expect(cacheKey('op', { a: 1, b: 'x' })).toBe(cacheKey('op', { b: 'x', a: 1 }));
    });

    it('should treat null and undefined parameters as absent', () => {
      expect(cacheKey('op', { a: 1, b: undefined, c: null })).toBe('op:{"a":1}');
    });

    it('should sort nested keys and keep array order', () => {
      expect(cacheKey('op', { b: { y: 1, x: 2 }, a: [1, 'z'] })).toBe('op:{"a":[1,"z"],"b":{"x":2,"y":1}}');
    });

    it('should separate operations with the same parameters', () => {
      expect(cacheKey('search_datasets', { page: 1 })).not.toBe(cacheKey('list_models', { page: 1 }));
    });
  });
});
