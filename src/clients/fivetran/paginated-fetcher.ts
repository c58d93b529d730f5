/**
 * PaginatedFetcher
 *
 * Walks cursor-linked Fivetran collections through the shared
 * HttpRequestHandler and exposes them as one flat item stream.
 *
 * Features:
 * - Fixed page size (100)
 * - One-page lookahead: the next page downloads while the current one is consumed
 * - Malformed or empty bodies end the traversal quietly (logged, not thrown)
 * - Single-object endpoints via fetchItem()
 */

import { FIVETRAN_PAGE_SIZE } from '../../config/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { HttpRequestHandler, MalformedResponseError } from '../http/index.js';
import { buildPageUrl, decodePage, isRecord, parseJson } from './page-decoder.js';
import { PaginatedItemStream } from './paginated-item-stream.js';
import type { Page } from './types.js';

export interface PaginatedFetcherDependencies {
  /**
   * Dispatcher shared by all fetchers
   * If not provided, the singleton HttpRequestHandler instance will be used
   */
  requestHandler?: HttpRequestHandler;

  /**
   * @default FIVETRAN_PAGE_SIZE (100)
   */
  pageSize?: number;
}

export class PaginatedFetcher {
  private readonly requestHandler: HttpRequestHandler;
  private readonly pageSize: number;
  private readonly logger: ServiceLogger;

  constructor(dependencies: PaginatedFetcherDependencies = {}) {
    this.logger = createServiceLogger('PaginatedFetcher');
    this.requestHandler = dependencies.requestHandler ?? HttpRequestHandler.getInstance();
    this.pageSize = dependencies.pageSize ?? FIVETRAN_PAGE_SIZE;
  }

  /**
   * Stream every item of a paginated endpoint, in page order
   *
   * Nothing is requested until the stream is first pulled. Each call returns
   * a new, single-pass stream.
   *
   * @param endpoint - Path relative to the API base URL (e.g., 'groups')
   * @param signal - Cancels the traversal
   *
   * @example
   * ```typescript
   * const fetcher = new PaginatedFetcher();
   * for await (const group of fetcher.fetchItems<FivetranGroup>('groups', signal)) {
   *   console.log(group.name);
   * }
   * ```
   */
  fetchItems<T>(endpoint: string, signal?: AbortSignal): PaginatedItemStream<T> {
    log.methodEntry(this.logger, 'fetchItems', { endpoint, pageSize: this.pageSize });

    return new PaginatedItemStream<T>({
      loadPage: (cursor, pageSignal) => this.fetchPage<T>(endpoint, cursor, pageSignal),
      signal,
      endpoint,
      logger: this.logger,
    });
  }

  /**
   * Fetch a single page
   *
   * @param cursor - Continuation token, or null for the first page
   * @returns The page; an empty, final page when the body is malformed
   */
  async fetchPage<T>(
    endpoint: string,
    cursor: string | null,
    signal?: AbortSignal
  ): Promise<Page<T>> {
    const url = buildPageUrl(endpoint, this.pageSize, cursor);
    const snapshot = await this.requestHandler.get(url, signal);

    const page = decodePage<T>(snapshot.body);
    if (!page) {
      this.logger.warn(
        { url: snapshot.url, bodyLength: snapshot.body.length },
        'Malformed page response, treating as last page'
      );
      return { items: [], nextCursor: null };
    }
    return page;
  }

  /**
   * Fetch a single-object endpoint (`{ "data": { ... } }`)
   *
   * @throws MalformedResponseError if the body has no `data` object
   */
  async fetchItem<T>(endpoint: string, signal?: AbortSignal): Promise<T> {
    log.methodEntry(this.logger, 'fetchItem', { endpoint });

    const snapshot = await this.requestHandler.get(endpoint, signal);
    const parsed = parseJson(snapshot.body);

    if (!isRecord(parsed) || !isRecord(parsed['data'])) {
      const error = new MalformedResponseError(snapshot.url, 'missing data object');
      log.methodError(this.logger, 'fetchItem', error, { endpoint });
      throw error;
    }

    log.methodExit(this.logger, 'fetchItem', { endpoint });
    return parsed['data'] as T;
  }
}

/**
 * Drain an item stream into an array
 */
export async function collectItems<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}
