/**
 * Fivetran API Configuration
 *
 * Environment Variables (all optional):
 * - FIVETRAN_API_BASE_URL                - REST API root, default https://api.fivetran.com/v1/
 * - FIVETRAN_MAX_CONCURRENT_REQUESTS     - outbound request cap, 0 = unbounded (default 0)
 * - FIVETRAN_RESPONSE_CACHE_TTL_MINUTES  - response cache lifetime (default 60)
 */

/**
 * Page size requested from every paginated endpoint
 */
export const FIVETRAN_PAGE_SIZE = 100;

/**
 * Backoff applied after a 429 that carries no usable Retry-After header
 */
export const DEFAULT_RETRY_AFTER_MS = 60_000;

export const DEFAULT_FIVETRAN_API_BASE_URL = 'https://api.fivetran.com/v1/';

const DEFAULT_RESPONSE_CACHE_TTL_MINUTES = 60;

export interface FivetranConfig {
  /** Absolute base URL; relative endpoints are resolved against it */
  baseUrl: string;
  /** Maximum simultaneous outbound requests (0 = unbounded) */
  maxConcurrentRequests: number;
  /** Lifetime of a cached successful response in milliseconds */
  responseCacheTtlMs: number;
}

/**
 * Error thrown when an environment variable holds an unusable value
 */
export class ConfigurationError extends Error {
  constructor(
    public readonly variable: string,
    message: string
  ) {
    super(`Invalid ${variable}: ${message}`);
    this.name = 'ConfigurationError';
  }
}

function readBaseUrl(raw: string | undefined): string {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_FIVETRAN_API_BASE_URL;
  }

  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    throw new ConfigurationError('FIVETRAN_API_BASE_URL', `'${raw}' is not an absolute URL`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(
      'FIVETRAN_API_BASE_URL',
      `unsupported protocol '${parsed.protocol}'`
    );
  }

  // Relative endpoints only resolve under the base path when it ends with '/'
  if (!parsed.pathname.endsWith('/')) {
    parsed.pathname = `${parsed.pathname}/`;
  }
  return parsed.href;
}

function readMaxConcurrentRequests(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return 0;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(
      'FIVETRAN_MAX_CONCURRENT_REQUESTS',
      `expected a non-negative integer, got '${raw}'`
    );
  }
  return value;
}

function readCacheTtlMs(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_RESPONSE_CACHE_TTL_MINUTES * 60_000;
  }
  const minutes = Number(raw);
  if (!Number.isFinite(minutes) || minutes <= 0) {
    throw new ConfigurationError(
      'FIVETRAN_RESPONSE_CACHE_TTL_MINUTES',
      `expected a positive number, got '${raw}'`
    );
  }
  return minutes * 60_000;
}

/**
 * Read the Fivetran configuration from the environment
 *
 * @param env - Environment to read from (defaults to process.env)
 * @throws ConfigurationError if a variable is set to an invalid value
 */
export function getFivetranConfig(
  env: NodeJS.ProcessEnv = process.env
): FivetranConfig {
  return {
    baseUrl: readBaseUrl(env['FIVETRAN_API_BASE_URL']),
    maxConcurrentRequests: readMaxConcurrentRequests(env['FIVETRAN_MAX_CONCURRENT_REQUESTS']),
    responseCacheTtlMs: readCacheTtlMs(env['FIVETRAN_RESPONSE_CACHE_TTL_MINUTES']),
  };
}
