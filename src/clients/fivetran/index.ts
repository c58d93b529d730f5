/**
 * Fivetran Client Exports
 */

export {
  FivetranClient,
  type FivetranClientDependencies,
} from './fivetran-client.js';

export {
  PaginatedFetcher,
  collectItems,
  type PaginatedFetcherDependencies,
} from './paginated-fetcher.js';

export {
  PaginatedItemStream,
  type PageLoader,
  type PaginatedItemStreamOptions,
} from './paginated-item-stream.js';

export { buildPageUrl, decodePage } from './page-decoder.js';

export type { Page, FivetranGroup, FivetranConnector } from './types.js';
