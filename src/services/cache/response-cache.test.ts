/**
 * Unit tests for ResponseCache
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ResponseCache } from './response-cache.js';

function createDeferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('ResponseCache', () => {
  let now: number;
  let cache: ResponseCache<string>;

  beforeEach(() => {
    now = 0;
    cache = new ResponseCache<string>({ now: () => now });
  });

  // ============================================================================
  // getOrAdd() - Populate or read
  // ============================================================================

  describe('getOrAdd()', () => {
    it('should call the factory on a miss and serve later calls from cache', async () => {
      const factory = vi.fn().mockResolvedValue('value');

      await expect(cache.getOrAdd('key', factory, 1000)).resolves.toBe('value');
      await expect(cache.getOrAdd('key', factory, 1000)).resolves.toBe('value');

      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('should share one in-flight factory call between concurrent callers', async () => {
      const deferred = createDeferred<string>();
      const factory = vi.fn().mockReturnValue(deferred.promise);

      const first = cache.getOrAdd('key', factory, 1000);
      const second = cache.getOrAdd('key', factory, 1000);
      const third = cache.getOrAdd('key', factory, 1000);

      expect(cache.isPending('key')).toBe(true);
      deferred.resolve('shared');

      await expect(Promise.all([first, second, third])).resolves.toEqual([
        'shared',
        'shared',
        'shared',
      ]);
      expect(factory).toHaveBeenCalledTimes(1);
      expect(cache.isPending('key')).toBe(false);
    });

    it('should keep different keys apart', async () => {
      await cache.getOrAdd('a', async () => 'value-a', 1000);
      await cache.getOrAdd('b', async () => 'value-b', 1000);

      expect(cache.get('a')).toBe('value-a');
      expect(cache.get('b')).toBe('value-b');
    });

    it('should hand a failure to every waiter and cache nothing', async () => {
      const deferred = createDeferred<string>();
      const failing = vi.fn().mockReturnValue(deferred.promise);

      const first = cache.getOrAdd('key', failing, 1000);
      const second = cache.getOrAdd('key', failing, 1000);
      deferred.reject(new Error('Upstream failed'));

      const results = await Promise.allSettled([first, second]);
      expect(results.map((result) => result.status)).toEqual(['rejected', 'rejected']);
      expect(failing).toHaveBeenCalledTimes(1);
      expect(cache.get('key')).toBeUndefined();

      const retry = vi.fn().mockResolvedValue('recovered');
      await expect(cache.getOrAdd('key', retry, 1000)).resolves.toBe('recovered');
      expect(retry).toHaveBeenCalledTimes(1);
    });

    it('should reject when the factory throws synchronously', async () => {
      await expect(
        cache.getOrAdd(
          'key',
          () => {
            throw new Error('Sync failure');
          },
          1000
        )
      ).rejects.toThrow('Sync failure');

      expect(cache.isPending('key')).toBe(false);
    });

    it('should expire entries once the TTL has elapsed', async () => {
      const factory = vi.fn().mockResolvedValueOnce('first').mockResolvedValueOnce('second');

      await cache.getOrAdd('key', factory, 1000);

      now = 999;
      await expect(cache.getOrAdd('key', factory, 1000)).resolves.toBe('first');

      now = 1000;
      await expect(cache.getOrAdd('key', factory, 1000)).resolves.toBe('second');
      expect(factory).toHaveBeenCalledTimes(2);
    });

    it('should count the TTL from completion, not from the start', async () => {
      const deferred = createDeferred<string>();
      const population = cache.getOrAdd('key', () => deferred.promise, 1000);

      now = 500;
      deferred.resolve('slow');
      await population;

      now = 1400;
      expect(cache.get('key')).toBe('slow');

      now = 1500;
      expect(cache.get('key')).toBeUndefined();
    });
  });

  // ============================================================================
  // Maintenance
  // ============================================================================

  describe('delete() and clear()', () => {
    beforeEach(async () => {
      await cache.getOrAdd('groups?limit=100', async () => 'g', 1000);
      await cache.getOrAdd('groups?limit=100&cursor=c1', async () => 'g2', 1000);
      await cache.getOrAdd('connectors/abc', async () => 'c', 1000);
    });

    it('should delete a single entry', () => {
      expect(cache.delete('connectors/abc')).toBe(true);
      expect(cache.delete('connectors/abc')).toBe(false);
      expect(cache.get('connectors/abc')).toBeUndefined();
    });

    it('should clear entries by prefix', () => {
      expect(cache.clear('groups')).toBe(2);
      expect(cache.get('connectors/abc')).toBe('c');
    });

    it('should clear everything without a prefix', () => {
      expect(cache.clear()).toBe(3);
      expect(cache.getStats().totalEntries).toBe(0);
    });
  });

  describe('cleanup() and getStats()', () => {
    it('should report and sweep expired entries', async () => {
      await cache.getOrAdd('short', async () => 's', 100);
      await cache.getOrAdd('long', async () => 'l', 10_000);
      const pending = cache.getOrAdd('pending', () => new Promise<string>(() => undefined), 100);

      now = 500;
      expect(cache.getStats()).toEqual({
        totalEntries: 2,
        expiredEntries: 1,
        activeEntries: 1,
        inFlight: 1,
      });

      expect(cache.cleanup()).toBe(1);
      expect(cache.getStats().totalEntries).toBe(1);
      expect(cache.get('long')).toBe('l');
      expect(pending).toBeInstanceOf(Promise);
    });
  });
});
