/**
 * HttpRequestHandler
 *
 * Rate-limit aware GET dispatcher shared by every fetcher of one API.
 *
 * Features:
 * - Bounded concurrency through a Semaphore (0 = unbounded)
 * - One shared backoff window: a 429 pauses every caller until it closes
 * - Retry-After support (delta-seconds or HTTP date, 60s when absent)
 * - Single-flight response cache keyed by the absolute URL (1-hour TTL)
 * - Cooperative cancellation through AbortSignal
 *
 * A cached URL is answered without touching the gate or the backoff window,
 * so cached pages stay available while the API is rate limiting us.
 */

import { getFivetranConfig } from '../../config/index.js';
import type { FivetranConfig } from '../../config/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { ResponseCache } from '../../services/cache/index.js';
import {
  Semaphore,
  raceWithSignal,
  sleep,
  throwIfCancelled,
} from '../../utils/concurrency/index.js';
import { BackoffWindow, parseRetryAfter } from '../../utils/rate-limit/index.js';
import { HttpRequestError, RequestCancelledError } from './errors.js';

const HTTP_TOO_MANY_REQUESTS = 429;

/**
 * Buffered result of one GET
 *
 * The body is read once and kept as text so a cached snapshot can be
 * handed to any number of callers.
 */
export interface HttpResponseSnapshot {
  /** Absolute request URL */
  url: string;
  status: number;
  statusText: string;
  /** Response headers, names lower-cased */
  headers: Record<string, string>;
  body: string;
}

export interface HttpRequestHandlerDependencies {
  /**
   * Configuration; read from the environment when not provided
   */
  config?: FivetranConfig;

  /**
   * Response cache; a private cache is created when not provided
   */
  responseCache?: ResponseCache<HttpResponseSnapshot>;

  /**
   * Concurrency gate; built from config.maxConcurrentRequests when not provided
   */
  semaphore?: Semaphore;

  /**
   * Shared backoff window; an 'overwrite' window when not provided
   * Pass `new BackoffWindow({ policy: 'max' })` to keep the later deadline.
   */
  backoffWindow?: BackoffWindow;

  /**
   * Name used in log output
   * @default 'Fivetran'
   */
  apiName?: string;
}

export class HttpRequestHandler {
  private static instance: HttpRequestHandler | null = null;

  private readonly baseUrl: string;
  private readonly cacheTtlMs: number;
  private readonly responseCache: ResponseCache<HttpResponseSnapshot>;
  private readonly semaphore: Semaphore;
  private readonly backoffWindow: BackoffWindow;
  private readonly apiName: string;
  private readonly logger: ServiceLogger;

  constructor(dependencies: HttpRequestHandlerDependencies = {}) {
    const config = dependencies.config ?? getFivetranConfig();

    this.logger = createServiceLogger('HttpRequestHandler');
    this.baseUrl = config.baseUrl;
    this.cacheTtlMs = config.responseCacheTtlMs;
    this.apiName = dependencies.apiName ?? 'Fivetran';
    this.responseCache =
      dependencies.responseCache ??
      new ResponseCache<HttpResponseSnapshot>({ name: 'HttpResponseCache' });
    this.semaphore =
      dependencies.semaphore ??
      new Semaphore({ capacity: config.maxConcurrentRequests, name: 'HttpRequestGate' });
    this.backoffWindow =
      dependencies.backoffWindow ??
      new BackoffWindow({ name: 'HttpBackoffWindow' });
  }

  /**
   * Get singleton instance of HttpRequestHandler
   */
  static getInstance(): HttpRequestHandler {
    if (!HttpRequestHandler.instance) {
      HttpRequestHandler.instance = new HttpRequestHandler();
    }
    return HttpRequestHandler.instance;
  }

  /**
   * Reset singleton instance (useful for testing)
   */
  static resetInstance(): void {
    HttpRequestHandler.instance = null;
  }

  /**
   * GET a URL through the cache, the concurrency gate and the backoff window
   *
   * @param url - Absolute URL, or a path relative to the configured base URL
   * @param signal - Aborts the wait (and the request, if this call started it)
   * @returns Buffered 2xx response
   * @throws HttpRequestError for any non-success status other than 429
   * @throws RequestCancelledError if `signal` fires first
   *
   * @example
   * ```typescript
   * const handler = HttpRequestHandler.getInstance();
   * const snapshot = await handler.get('groups?limit=100', controller.signal);
   * const envelope: unknown = JSON.parse(snapshot.body);
   * ```
   */
  async get(url: string, signal?: AbortSignal): Promise<HttpResponseSnapshot> {
    const requestUrl = this.resolveUrl(url);
    log.methodEntry(this.logger, 'get', { url: requestUrl });

    try {
      for (;;) {
        throwIfCancelled(signal, requestUrl);
        try {
          const snapshot = await raceWithSignal(
            this.responseCache.getOrAdd(
              requestUrl,
              () => this.fetchWithBackoff(requestUrl, signal),
              this.cacheTtlMs
            ),
            signal,
            requestUrl
          );
          log.methodExit(this.logger, 'get', { url: requestUrl, status: snapshot.status });
          return snapshot;
        } catch (error) {
          // We joined a population whose starter was cancelled: start our own
          if (error instanceof RequestCancelledError && !signal?.aborted) {
            this.logger.debug({ url: requestUrl }, 'Shared request was cancelled, retrying');
            continue;
          }
          throw error;
        }
      }
    } catch (error) {
      if (error instanceof RequestCancelledError) {
        this.logger.debug({ url: requestUrl }, 'Request cancelled');
      } else {
        log.methodError(
          this.logger,
          'get',
          error instanceof Error ? error : new Error(String(error)),
          { url: requestUrl }
        );
      }
      throw error;
    }
  }

  /**
   * Absolute form of `url`, which is also its cache key
   */
  resolveUrl(url: string): string {
    return new URL(url, this.baseUrl).href;
  }

  /**
   * Current cache, gate and backoff state
   */
  getStats() {
    return {
      cache: this.responseCache.getStats(),
      gate: this.semaphore.getStats(),
      backoffRemainingMs: this.backoffWindow.remainingMs(),
    };
  }

  /**
   * Runs under one gate permit for its whole duration, retries included
   */
  private fetchWithBackoff(url: string, signal?: AbortSignal): Promise<HttpResponseSnapshot> {
    return this.semaphore.withPermit(async () => {
      for (;;) {
        const waitMs = this.backoffWindow.remainingMs();
        if (waitMs > 0) {
          this.logger.debug({ url, waitMs }, 'Waiting for backoff window to close');
          await sleep(waitMs, signal);
        }
        throwIfCancelled(signal, url);

        const snapshot = await this.send(url, signal);

        if (snapshot.status === HTTP_TOO_MANY_REQUESTS) {
          const retryAfterMs = parseRetryAfter(snapshot.headers['retry-after'] ?? null);
          log.rateLimited(this.logger, url, retryAfterMs);
          this.backoffWindow.backOff(retryAfterMs);
          continue;
        }

        if (snapshot.status < 200 || snapshot.status >= 300) {
          throw new HttpRequestError(url, snapshot.status, snapshot.statusText, snapshot.body);
        }

        return snapshot;
      }
    }, signal, url);
  }

  private async send(url: string, signal?: AbortSignal): Promise<HttpResponseSnapshot> {
    log.externalApiCall(this.logger, this.apiName, url);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal,
      });
      const body = await response.text();

      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });

      return {
        url,
        status: response.status,
        statusText: response.statusText,
        headers,
        body,
      };
    } catch (error) {
      if (signal?.aborted) {
        throw new RequestCancelledError(url, signal.reason);
      }
      throw error;
    }
  }
}
