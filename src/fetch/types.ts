/**
 * Shared types for the fetch module
 */

/** One request attempt. Created per attempt and never mutated. */
export interface FetchRequest {
  readonly url: string;
  /** 0 for the first try, incremented for each retry. */
  readonly attempt: number;
  /** Lower-cased hostname, the key for per-host politeness. */
  readonly domain: string;
}

export type FetchFailureKind =
  | 'network_error'
  | 'timeout'
  | 'http_status_error'
  | 'response_too_large'
  | 'disallowed_by_robots'
  | 'cancelled';

export interface FetchSuccess {
  ok: true;
  url: string;
  status: number;
  body: string;
  headers: Record<string, string>;
  /** URL after redirects, when the transport reports it. */
  finalUrl?: string;
  elapsedMs: number;
  /** Number of requests made, including the successful one. */
  attempts: number;
}

export interface FetchFailure {
  ok: false;
  url: string;
  kind: FetchFailureKind;
  retriable: boolean;
  message: string;
  statusCode?: number;
  /** Server-requested wait from a Retry-After header. */
  retryAfterMs?: number;
  elapsedMs: number;
  attempts: number;
}

export type FetchResult = FetchSuccess | FetchFailure;

/** Low-level outcome of a single HTTP exchange, before classification. */
export interface HttpResponse {
  success: boolean;
  statusCode: number;
  body?: string;
  headers: Record<string, string>;
  /** URL after redirects, when known. */
  finalUrl?: string;
  error?: 'timeout' | 'network' | 'response_too_large';
  message?: string;
}

export interface HttpRequestOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  preset?: string;
}

/**
 * Performs one GET request. Implementations report failures in the returned
 * HttpResponse rather than throwing.
 */
export type HttpTransport = (url: string, options: HttpRequestOptions) => Promise<HttpResponse>;
