/**
 * Cache Service Module
 *
 * In-process TTL cache with single-flight population.
 */

export { ResponseCache } from './response-cache.js';
export type { ResponseCacheDependencies, ResponseCacheStats } from './response-cache.js';
