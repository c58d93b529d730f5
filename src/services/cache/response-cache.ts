/**
 * ResponseCache
 *
 * In-process, time-bounded key/value store with single-flight population.
 *
 * Features:
 * - TTL counted from the moment a population completes
 * - Lazy expiry on read, plus an explicit cleanup() sweep
 * - Concurrent getOrAdd() calls for one key share a single factory call
 * - Failed populations are never stored; the next call starts a fresh attempt
 *
 * Entries live for the lifetime of the process only.
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface ResponseCacheDependencies {
  /**
   * Clock source in epoch milliseconds
   * @default Date.now
   */
  now?: () => number;

  /**
   * Optional name for logging purposes
   * @default 'ResponseCache'
   */
  name?: string;
}

export interface ResponseCacheStats {
  totalEntries: number;
  expiredEntries: number;
  activeEntries: number;
  inFlight: number;
}

export class ResponseCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, Promise<V>>();
  private readonly now: () => number;
  private readonly logger: ServiceLogger;

  constructor(dependencies: ResponseCacheDependencies = {}) {
    this.now = dependencies.now ?? (() => Date.now());
    this.logger = createServiceLogger(dependencies.name || 'ResponseCache');
  }

  /**
   * Return the live value for `key`, or populate it with `factory`
   *
   * If another caller's population for `key` is already running, this call
   * settles with that population's outcome instead of invoking `factory`.
   *
   * @param key - Cache key
   * @param factory - Produces the value on a miss
   * @param ttlMs - How long a successful value stays live after completion
   * @returns The cached or freshly produced value
   *
   * @example
   * ```typescript
   * const snapshot = await cache.getOrAdd(url, () => download(url), 60 * 60_000);
   * ```
   */
  getOrAdd(key: string, factory: () => Promise<V>, ttlMs: number): Promise<V> {
    const entry = this.readLive(key);
    if (entry) {
      log.cacheHit(this.logger, 'getOrAdd', key);
      return Promise.resolve(entry.value);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.logger.debug({ cacheKey: key }, 'Joining in-flight population');
      return pending;
    }

    log.cacheMiss(this.logger, 'getOrAdd', key);

    let started: Promise<V>;
    try {
      started = factory();
    } catch (error) {
      return Promise.reject(error);
    }

    const population = started
      .then((value) => {
        this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, population);
    return population;
  }

  /**
   * Get a live value without populating
   *
   * @returns The value, or undefined when absent or expired
   */
  get(key: string): V | undefined {
    return this.readLive(key)?.value;
  }

  /**
   * Whether a population for `key` is currently running
   */
  isPending(key: string): boolean {
    return this.inFlight.has(key);
  }

  /**
   * Remove one entry
   *
   * An in-flight population is not affected and will store its result.
   *
   * @returns true if an entry was removed
   */
  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Remove all entries, or those whose key starts with `prefix`
   *
   * @returns Number of entries removed
   */
  clear(prefix?: string): number {
    if (prefix === undefined) {
      const count = this.entries.size;
      this.entries.clear();
      this.logger.info({ count }, 'Cache cleared');
      return count;
    }

    let count = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        count++;
      }
    }
    this.logger.info({ prefix, count }, 'Cache entries cleared');
    return count;
  }

  /**
   * Remove expired entries
   *
   * Expiry is already enforced on read; this only reclaims memory held by
   * entries nobody has asked for since they expired.
   *
   * @returns Number of entries removed
   */
  cleanup(): number {
    const now = this.now();
    let count = 0;
    for (const [key, entry] of [...this.entries]) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        count++;
      }
    }
    this.logger.debug({ count }, 'Expired cache entries cleaned up');
    return count;
  }

  getStats(): ResponseCacheStats {
    const now = this.now();
    let expiredEntries = 0;
    for (const entry of this.entries.values()) {
      if (entry.expiresAt <= now) {
        expiredEntries++;
      }
    }

    return {
      totalEntries: this.entries.size,
      expiredEntries,
      activeEntries: this.entries.size - expiredEntries,
      inFlight: this.inFlight.size,
    };
  }

  private readLive(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.logger.debug({ cacheKey: key, expiresAt: entry.expiresAt }, 'Cache entry expired');
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
