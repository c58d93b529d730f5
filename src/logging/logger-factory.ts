/**
 * Logger Factory
 *
 * Creates component-specific Pino child loggers and a small set of
 * logging patterns shared by the cache, the dispatcher and the fetchers.
 */

import type pino from 'pino';
import { logger as baseLogger } from './logger.js';

/**
 * Logger bound to one component (carries a `service` field)
 */
export type ServiceLogger = pino.Logger;

/**
 * Create a component logger with structured context
 *
 * @param serviceName - Name of the component (e.g., 'HttpRequestHandler')
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('PaginatedFetcher');
 * logger.info('Fetching first page');
 * // Output: {"level":"info","service":"PaginatedFetcher","msg":"Fetching first page"}
 * ```
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return baseLogger.child({
    service: serviceName,
  });
}

/**
 * Common logging patterns
 *
 * Keeps the log shape uniform across components.
 */
export const LogPatterns = {
  /**
   * Log method entry (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodEntry(logger, 'get', { url });
   * // Output: {"level":"debug","service":"...","method":"get","params":{"url":"..."},"msg":"Entering get"}
   * ```
   */
  methodEntry: (
    logger: ServiceLogger,
    method: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ method, params }, `Entering ${method}`);
  },

  /**
   * Log method exit (debug level)
   *
   * @param result - Optional result summary (avoid logging large objects)
   */
  methodExit: (
    logger: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    logger.debug({ method, result }, `Exiting ${method}`);
  },

  /**
   * Log method error (error level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodError(logger, 'get', error, { url });
   * // Output: {"level":"error","service":"...","method":"get","error":"HTTP 404 Not Found","stack":"...","url":"...","msg":"Error in get"}
   * ```
   */
  methodError: (
    logger: ServiceLogger,
    method: string,
    error: Error,
    context: Record<string, unknown> = {}
  ) => {
    logger.error(
      {
        method,
        error: error.message,
        errorName: error.name,
        stack: error.stack,
        ...context,
      },
      `Error in ${method}`
    );
  },

  /**
   * Log external API call (debug level)
   *
   * @param api - API name (e.g., 'Fivetran')
   * @param endpoint - Request URL or path
   */
  externalApiCall: (
    logger: ServiceLogger,
    api: string,
    endpoint: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ api, endpoint, params }, `External API call: ${api}`);
  },

  /**
   * Log cache hit (debug level)
   */
  cacheHit: (logger: ServiceLogger, method: string, cacheKey?: string) => {
    logger.debug({ method, cacheKey }, `Cache hit`);
  },

  /**
   * Log cache miss (debug level)
   */
  cacheMiss: (logger: ServiceLogger, method: string, cacheKey?: string) => {
    logger.debug({ method, cacheKey }, `Cache miss`);
  },

  /**
   * Log a rate-limit response and the backoff it causes (warn level)
   *
   * @example
   * ```typescript
   * LogPatterns.rateLimited(logger, url, 5000);
   * // Output: {"level":"warn","service":"...","url":"...","retryAfterMs":5000,"msg":"Rate limited, backing off"}
   * ```
   */
  rateLimited: (logger: ServiceLogger, url: string, retryAfterMs: number) => {
    logger.warn({ url, retryAfterMs }, 'Rate limited, backing off');
  },
};

/**
 * Alias for LogPatterns for more concise usage
 *
 * @example
 * ```typescript
 * log.methodEntry(logger, 'fetchItems', { endpoint: 'groups' });
 * log.methodExit(logger, 'fetchItems');
 * ```
 */
export const log = LogPatterns;
