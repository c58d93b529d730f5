/**
 * PaginatedItemStream
 *
 * Pull-based, single-pass iterator over the items of a cursor-paginated
 * collection. While the items of page N are consumed, the request for
 * page N+1 is already running (lookahead depth 1, never N+2).
 *
 * States:
 * - fetching-first: nothing requested yet; the first next() loads page 1
 * - yielding: a current page plus, when it has a cursor, its lookahead request
 * - exhausted: end of collection, error, cancellation or early return()
 *
 * Cancellation is checked before every item. Aborting the caller's signal,
 * or calling return(), also aborts whichever page request is pending.
 * Once exhausted, the stream never leaves that state.
 */

import type { ServiceLogger } from '../../logging/index.js';
import {
  createLinkedAbortController,
  throwIfCancelled,
} from '../../utils/concurrency/index.js';
import type { Page } from './types.js';

/**
 * Loads one page; `cursor` is null for the first page
 */
export type PageLoader<T> = (cursor: string | null, signal: AbortSignal) => Promise<Page<T>>;

type StreamState<T> =
  | { kind: 'fetching-first' }
  | {
      kind: 'yielding';
      page: Page<T>;
      index: number;
      lookahead: Promise<Page<T>> | null;
    }
  | { kind: 'exhausted' };

export interface PaginatedItemStreamOptions<T> {
  loadPage: PageLoader<T>;
  signal?: AbortSignal;
  /** Used in log output only */
  endpoint: string;
  logger: ServiceLogger;
}

export class PaginatedItemStream<T> implements AsyncIterableIterator<T> {
  private state: StreamState<T> = { kind: 'fetching-first' };
  private readonly loadPage: PageLoader<T>;
  private readonly controller: AbortController;
  private readonly detachSignal: () => void;
  private readonly endpoint: string;
  private readonly logger: ServiceLogger;
  private chain: Promise<unknown> = Promise.resolve();
  private pagesLoaded = 0;
  private itemsYielded = 0;
  private stoppedByConsumer = false;

  constructor(options: PaginatedItemStreamOptions<T>) {
    const { controller, dispose } = createLinkedAbortController(options.signal);
    this.controller = controller;
    this.detachSignal = dispose;
    this.loadPage = options.loadPage;
    this.endpoint = options.endpoint;
    this.logger = options.logger;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  /**
   * Current state name (for diagnostics and tests)
   */
  get status(): StreamState<T>['kind'] {
    return this.state.kind;
  }

  /**
   * Produce the next item
   *
   * Overlapping calls are served one after another, in call order.
   *
   * @throws RequestCancelledError if the signal fired
   * @throws HttpRequestError if a page request failed
   */
  next(): Promise<IteratorResult<T, undefined>> {
    const result = this.chain.then(() => this.step());
    // Keep the queue alive after a failure; the caller sees `result` itself
    this.chain = result.catch(() => undefined);
    return result;
  }

  /**
   * Stop early: abort any pending page request and mark the stream exhausted
   *
   * A next() still waiting on a page settles as done.
   */
  async return(): Promise<IteratorResult<T, undefined>> {
    if (this.state.kind !== 'exhausted') {
      this.stoppedByConsumer = true;
      this.logger.debug(
        { endpoint: this.endpoint, itemsYielded: this.itemsYielded },
        'Traversal stopped by consumer'
      );
      this.finish();
    }
    return { done: true, value: undefined };
  }

  private async step(): Promise<IteratorResult<T, undefined>> {
    try {
      for (;;) {
        const state = this.state;

        switch (state.kind) {
          case 'exhausted':
            return { done: true, value: undefined };

          case 'fetching-first': {
            throwIfCancelled(this.controller.signal);
            const page = await this.loadPage(null, this.controller.signal);
            if (this.state.kind === 'exhausted') {
              return { done: true, value: undefined };
            }
            this.enterPage(page);
            break;
          }

          case 'yielding': {
            if (state.index < state.page.items.length) {
              throwIfCancelled(this.controller.signal);
              const item = state.page.items[state.index];
              state.index++;
              this.itemsYielded++;
              return { done: false, value: item };
            }

            if (!state.lookahead) {
              this.logger.info(
                { endpoint: this.endpoint, pages: this.pagesLoaded, items: this.itemsYielded },
                'Traversal complete'
              );
              this.finish();
              return { done: true, value: undefined };
            }

            const page = await state.lookahead;
            if (this.state.kind === 'exhausted') {
              return { done: true, value: undefined };
            }
            this.enterPage(page);
            break;
          }
        }
      }
    } catch (error) {
      if (this.stoppedByConsumer) {
        return { done: true, value: undefined };
      }
      this.finish();
      throw error;
    }
  }

  /**
   * Make `page` current and start its successor's request right away
   */
  private enterPage(page: Page<T>): void {
    this.pagesLoaded++;
    this.logger.debug(
      {
        endpoint: this.endpoint,
        page: this.pagesLoaded,
        itemCount: page.items.length,
        hasMore: page.nextCursor !== null,
      },
      'Page received'
    );

    let lookahead: Promise<Page<T>> | null = null;
    if (page.nextCursor !== null) {
      lookahead = this.loadPage(page.nextCursor, this.controller.signal);
      // Awaited in step(); this only covers a stream abandoned before that
      lookahead.catch(() => undefined);
    }

    this.state = { kind: 'yielding', page, index: 0, lookahead };
  }

  private finish(): void {
    // Covers the first-page request as well as a lookahead
    this.controller.abort();
    this.state = { kind: 'exhausted' };
    this.detachSignal();
  }
}
