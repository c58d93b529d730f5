/**
 * Retry-After parsing
 *
 * The header carries either delta-seconds ("120") or an HTTP date
 * ("Wed, 21 Oct 2026 07:28:00 GMT").
 */

import { DEFAULT_RETRY_AFTER_MS } from '../../config/index.js';

const DELTA_SECONDS = /^\d+$/;

// IMF-fixdate, RFC 850 and asctime forms all open with a day name
const HTTP_DATE = /^[A-Za-z]{3}/;

/**
 * Convert a Retry-After header value into a wait in milliseconds
 *
 * @param header - Raw header value (null when the server omitted it)
 * @param now - Current epoch milliseconds, used for HTTP dates
 * @param fallbackMs - Wait used when the header is missing or unparseable
 * @returns Non-negative wait in milliseconds
 *
 * @example
 * ```typescript
 * parseRetryAfter('5');   // 5000
 * parseRetryAfter(null);  // 60000
 * ```
 */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now(),
  fallbackMs: number = DEFAULT_RETRY_AFTER_MS
): number {
  if (header === null || header.trim() === '') {
    return fallbackMs;
  }

  const value = header.trim();
  if (DELTA_SECONDS.test(value)) {
    const ms = Number(value) * 1000;
    return Number.isFinite(ms) ? ms : fallbackMs;
  }
  if (!HTTP_DATE.test(value)) {
    return fallbackMs;
  }

  const date = Date.parse(value);
  if (isNaN(date)) {
    return fallbackMs;
  }
  return Math.max(0, date - now);
}
