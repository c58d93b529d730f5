/**
 * Utility exports
 */

// Concurrency gate and cancellation helpers
export * from './concurrency/index.js';

// Shared backoff window and Retry-After parsing
export * from './rate-limit/index.js';
