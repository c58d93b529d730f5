/**
 * HTTP client errors
 *
 * Rate limiting (429) never appears here: it is absorbed by the shared
 * backoff window in HttpRequestHandler.
 */

/**
 * Error thrown for any non-success, non-429 response
 */
export class HttpRequestError extends Error {
  constructor(
    public readonly url: string,
    public readonly statusCode: number,
    public readonly statusText: string,
    public readonly body: string = ''
  ) {
    super(`HTTP ${statusCode} ${statusText} for ${url}`);
    this.name = 'HttpRequestError';
  }
}

/**
 * Error thrown when the caller's AbortSignal fires
 *
 * Distinct from HttpRequestError so callers can tell a deliberate abort
 * from a failed request.
 */
export class RequestCancelledError extends Error {
  constructor(
    public readonly url?: string,
    public readonly reason?: unknown
  ) {
    super(url ? `Request cancelled: ${url}` : 'Request cancelled');
    this.name = 'RequestCancelledError';
  }
}

/**
 * Error thrown when a single-object response has no usable `data` envelope
 */
export class MalformedResponseError extends Error {
  constructor(public readonly url: string, detail: string) {
    super(`Malformed response from ${url}: ${detail}`);
    this.name = 'MalformedResponseError';
  }
}
