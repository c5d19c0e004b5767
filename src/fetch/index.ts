/**
 * Public API exports for the fetch module
 */
export { httpRequest, closeAllSessions } from './http-client.js';
export {
  fetchOnce,
  createFetchRequest,
  classifyResponse,
  isRetriableStatus,
  parseRetryAfter,
} from './fetcher.js';
export { fetchWithRetry, backoffDelay, cancelledFailure } from './retry.js';
export type { FetchContext, RetryPolicy } from './retry.js';
export type {
  FetchRequest,
  FetchResult,
  FetchSuccess,
  FetchFailure,
  FetchFailureKind,
  HttpResponse,
  HttpRequestOptions,
  HttpTransport,
} from './types.js';
