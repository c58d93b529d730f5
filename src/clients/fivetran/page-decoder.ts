/**
 * Page decoding and page URL construction
 */

import type { Page } from './types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON body, returning undefined instead of throwing
 */
export function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/**
 * Decode a paginated envelope
 *
 * Missing `items` decode as an empty page; a blank or non-string
 * `next_cursor` decodes as null.
 *
 * @returns The page, or null when the body is not a paginated envelope
 */
export function decodePage<T>(body: string): Page<T> | null {
  const parsed = parseJson(body);
  if (!isRecord(parsed) || !isRecord(parsed['data'])) {
    return null;
  }

  const { items, next_cursor: cursor } = parsed['data'];
  if (items !== undefined && items !== null && !Array.isArray(items)) {
    return null;
  }

  return {
    // Item shape belongs to the caller; the envelope is all we check
    items: (items ?? []) as T[],
    nextCursor: typeof cursor === 'string' && cursor.trim() !== '' ? cursor : null,
  };
}

/**
 * Build the URL of one page
 *
 * @example
 * ```typescript
 * buildPageUrl('groups', 100, null);       // 'groups?limit=100'
 * buildPageUrl('groups', 100, 'a b/c');    // 'groups?limit=100&cursor=a+b%2Fc'
 * ```
 */
export function buildPageUrl(endpoint: string, pageSize: number, cursor: string | null): string {
  const params = new URLSearchParams({ limit: String(pageSize) });
  if (cursor !== null) {
    params.set('cursor', cursor);
  }
  const separator = endpoint.includes('?') ? '&' : '?';
  return `${endpoint}${separator}${params.toString()}`;
}
