/**
 * Rate Limit Module
 *
 * Shared backoff window and Retry-After parsing for rate-limited APIs.
 */

export { BackoffWindow } from './backoff-window.js';
export type { BackoffPolicy, BackoffWindowOptions } from './backoff-window.js';
export { parseRetryAfter } from './retry-after.js';
