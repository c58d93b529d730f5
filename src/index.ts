/**
 * Fivetran API Client Services
 *
 * Request orchestration for the rate-limited Fivetran REST API:
 * - bounded concurrency and a shared 429 backoff window
 * - single-flight response caching
 * - cursor pagination with one-page lookahead
 */

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export cache
export * from './services/cache/index.js';

// Export clients
export * from './clients/index.js';

export const version = '0.1.0';
