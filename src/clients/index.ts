/**
 * Clients Exports
 *
 * Rate-limited HTTP dispatcher and the Fivetran API client built on it
 */

export {
  HttpRequestHandler,
  HttpRequestError,
  RequestCancelledError,
  MalformedResponseError,
  type HttpRequestHandlerDependencies,
  type HttpResponseSnapshot,
} from './http/index.js';

export {
  FivetranClient,
  PaginatedFetcher,
  PaginatedItemStream,
  collectItems,
  buildPageUrl,
  decodePage,
  type FivetranClientDependencies,
  type PaginatedFetcherDependencies,
  type PageLoader,
  type PaginatedItemStreamOptions,
  type Page,
  type FivetranGroup,
  type FivetranConnector,
} from './fivetran/index.js';
