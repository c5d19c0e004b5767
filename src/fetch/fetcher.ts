/**
 * Single-attempt fetch: one request through the transport, classified into a
 * FetchResult. Retries and politeness live with the caller (see retry.ts).
 */
import type {
  FetchFailure,
  FetchRequest,
  FetchResult,
  FetchSuccess,
  HttpResponse,
  HttpTransport,
} from './types.js';

export interface FetchOnceOptions {
  transport: HttpTransport;
  timeoutMs: number;
  userAgent?: string;
  preset?: string;
  /** Clock used for elapsed time; defaults to Date.now. */
  now?: () => number;
}

/** Build a FetchRequest for the given attempt. Throws on an unparseable URL. */
export function createFetchRequest(url: string, attempt = 0): FetchRequest {
  return Object.freeze({ url, attempt, domain: new URL(url).hostname.toLowerCase() });
}

/** Status codes worth retrying: server errors and explicit throttling. */
export function isRetriableStatus(status: number): boolean {
  return status >= 500 || status === 429;
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds.
 * Returns undefined when absent or unparseable.
 */
export function parseRetryAfter(value: string | undefined, nowMs: number): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return parseInt(trimmed, 10) * 1000;

  const date = Date.parse(trimmed);
  if (isNaN(date)) return undefined;
  return Math.max(0, date - nowMs);
}

/** Map a raw HTTP response onto the success/failure variants. */
export function classifyResponse(
  request: FetchRequest,
  response: HttpResponse,
  elapsedMs: number,
  nowMs: number
): FetchResult {
  const base = { url: request.url, elapsedMs, attempts: request.attempt + 1 };

  if (response.error === 'timeout') {
    return {
      ...base,
      ok: false,
      kind: 'timeout',
      retriable: true,
      message: response.message ?? 'Request timed out',
    };
  }
  if (response.error === 'response_too_large') {
    return {
      ...base,
      ok: false,
      kind: 'response_too_large',
      retriable: false,
      statusCode: response.statusCode || undefined,
      message: response.message ?? 'Response too large',
    };
  }
  if (response.error === 'network' || response.statusCode === 0) {
    return {
      ...base,
      ok: false,
      kind: 'network_error',
      retriable: true,
      message: response.message ?? 'Network error',
    };
  }

  const status = response.statusCode;
  if (status >= 200 && status < 400) {
    const success: FetchSuccess = {
      ...base,
      ok: true,
      status,
      body: response.body ?? '',
      headers: response.headers,
    };
    if (response.finalUrl) success.finalUrl = response.finalUrl;
    return success;
  }

  const failure: FetchFailure = {
    ...base,
    ok: false,
    kind: 'http_status_error',
    retriable: isRetriableStatus(status),
    statusCode: status,
    message: `HTTP ${status}`,
  };
  const retryAfterMs = parseRetryAfter(response.headers['retry-after'], nowMs);
  if (retryAfterMs !== undefined) failure.retryAfterMs = retryAfterMs;
  return failure;
}

/**
 * Issue exactly one request and classify the outcome.
 * Touches no shared state beyond the network call itself.
 */
export async function fetchOnce(
  request: FetchRequest,
  options: FetchOnceOptions
): Promise<FetchResult> {
  const now = options.now ?? Date.now;
  const startTime = now();
  const headers: Record<string, string> = {};
  if (options.userAgent) headers['User-Agent'] = options.userAgent;

  const response = await options.transport(request.url, {
    timeoutMs: options.timeoutMs,
    headers,
    preset: options.preset,
  });

  const finished = now();
  return classifyResponse(request, response, finished - startTime, finished);
}
