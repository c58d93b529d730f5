/**
 * HTTP Dispatcher Exports
 */

export {
  HttpRequestHandler,
  type HttpRequestHandlerDependencies,
  type HttpResponseSnapshot,
} from './http-request-handler.js';

export {
  HttpRequestError,
  RequestCancelledError,
  MalformedResponseError,
} from './errors.js';
