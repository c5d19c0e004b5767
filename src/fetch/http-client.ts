/**
 * Shared httpcloak client with browser-grade TLS fingerprints.
 * This is the default HttpTransport used by the fetcher and the robots policy.
 */
import httpcloak from 'httpcloak';
import { logger } from '../logger.js';
import type { HttpRequestOptions, HttpResponse } from './types.js';

/** Session metadata for lifecycle management */
interface SessionMetadata {
  session: httpcloak.Session;
  created: number;
  lastAccessed: number;
  requestCount: number;
  inFlightRequests: number;
}

/** Session cache keyed by "preset|timeoutSec" */
const sessionCache = new Map<string, SessionMetadata>();

const SESSION_MAX_AGE_MS = 60 * 60 * 1000; // 1 hour
const SESSION_MAX_REQUESTS = 10000;
const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB
const MAX_SESSIONS = 20;

/** Default TLS preset */
const DEFAULT_PRESET = httpcloak.Preset.CHROME_143;

/**
 * Default request headers. The preset supplies User-Agent and client hints;
 * Cache-Control keeps CDNs from answering 304 to a client that has no cache.
 */
const DEFAULT_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Cache-Control': 'no-cache',
};

class RequestTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms for ${url}`);
    this.name = 'RequestTimeoutError';
  }
}

function closeQuietly(key: string, meta: SessionMetadata): void {
  try {
    meta.session.close();
  } catch (error) {
    logger.warn({ key, error: String(error) }, 'Error closing httpcloak session');
  }
}

/**
 * Evict the least-recently-used session that has no in-flight requests.
 * Called when the session cache exceeds MAX_SESSIONS.
 */
function evictLruSession(): void {
  let oldestKey: string | undefined;
  let oldest: SessionMetadata | undefined;

  for (const [key, meta] of sessionCache) {
    if (meta.inFlightRequests === 0 && (!oldest || meta.lastAccessed < oldest.lastAccessed)) {
      oldest = meta;
      oldestKey = key;
    }
  }

  if (oldestKey && oldest) {
    sessionCache.delete(oldestKey);
    closeQuietly(oldestKey, oldest);
    logger.debug({ key: oldestKey }, 'Evicted LRU session');
  }
}

/**
 * Get or create the httpcloak session for a preset/timeout pair.
 * Sessions are recycled after 1 hour or 10,000 requests once idle.
 * The constructor is synchronous, so no creation lock is needed.
 */
function acquireSession(preset: string | undefined, timeoutSec: number): SessionMetadata {
  const presetValue = preset ?? DEFAULT_PRESET;
  const cacheKey = `${presetValue}|${timeoutSec}`;
  const now = Date.now();

  const existing = sessionCache.get(cacheKey);
  if (existing) {
    const needsRecycling =
      now - existing.created > SESSION_MAX_AGE_MS || existing.requestCount >= SESSION_MAX_REQUESTS;

    if (!needsRecycling || existing.inFlightRequests > 0) {
      existing.requestCount++;
      existing.inFlightRequests++;
      existing.lastAccessed = now;
      return existing;
    }

    logger.info({ key: cacheKey, requests: existing.requestCount }, 'Recycling httpcloak session');
    sessionCache.delete(cacheKey);
    closeQuietly(cacheKey, existing);
  }

  while (sessionCache.size >= MAX_SESSIONS) {
    const before = sessionCache.size;
    evictLruSession();
    // Every session is busy; allow exceeding the cap temporarily
    if (sessionCache.size === before) break;
  }

  logger.debug({ key: cacheKey }, 'Creating httpcloak session');
  const meta: SessionMetadata = {
    session: new httpcloak.Session({ preset: presetValue, timeout: timeoutSec }),
    created: now,
    lastAccessed: now,
    requestCount: 1,
    inFlightRequests: 1,
  };
  sessionCache.set(cacheKey, meta);
  return meta;
}

/**
 * Close all httpcloak sessions.
 * The CLI calls this before exiting.
 */
export async function closeAllSessions(): Promise<void> {
  const entries = Array.from(sessionCache.entries());
  sessionCache.clear();
  for (const [key, meta] of entries) {
    closeQuietly(key, meta);
  }
}

/** Create a timeout promise that rejects after the specified timeout. */
function createRequestTimeout(
  url: string,
  timeoutMs: number
): { promise: Promise<never>; cancel: () => void } {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const promise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new RequestTimeoutError(url, timeoutMs)), timeoutMs);
  });
  return { promise, cancel: () => clearTimeout(timeoutId) };
}

function tooLarge(statusCode: number, message: string): HttpResponse {
  return {
    success: false,
    statusCode,
    headers: {},
    error: 'response_too_large',
    message,
  };
}

/** Lower-case header names so lookups do not depend on server casing. */
function normalizeHeaders(headers: Record<string, string> | undefined): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    normalized[name.toLowerCase()] = String(value);
  }
  return normalized;
}

/**
 * Make an HTTP GET request with a browser-grade fingerprint.
 * Never throws: timeouts and network failures are reported in the response.
 */
export async function httpRequest(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
  const timeoutSec = Math.max(1, Math.ceil(options.timeoutMs / 1000));
  let meta: SessionMetadata | undefined;
  const timeout = createRequestTimeout(url, options.timeoutMs);

  try {
    meta = acquireSession(options.preset, timeoutSec);
    const requestOptions: httpcloak.RequestOptions = {
      headers: { ...DEFAULT_HEADERS, ...options.headers },
    };

    logger.debug({ url, timeoutMs: options.timeoutMs }, 'Making httpcloak request');
    const response = await Promise.race([meta.session.get(url, requestOptions), timeout.promise]);
    const headers = normalizeHeaders(response.headers);

    // Check Content-Length before reading the body
    const contentLength = parseInt(headers['content-length'] ?? '', 10);
    if (!isNaN(contentLength) && contentLength > MAX_RESPONSE_SIZE) {
      logger.warn({ url, contentLength, limit: MAX_RESPONSE_SIZE }, 'Content-Length exceeds size limit');
      return tooLarge(response.statusCode, `Content-Length ${contentLength} exceeds limit`);
    }

    // httpcloak exposes text either as a property or as a method depending on version
    const textValue = response.text as string | (() => string);
    const body = typeof textValue === 'function' ? textValue() : textValue;

    // Fallback for chunked/compressed responses without Content-Length
    if (body && body.length > MAX_RESPONSE_SIZE) {
      logger.warn({ url, size: body.length, limit: MAX_RESPONSE_SIZE }, 'Response exceeds size limit');
      return tooLarge(response.statusCode, `Body of ${body.length} characters exceeds limit`);
    }

    logger.debug(
      { url, statusCode: response.statusCode, bodyLength: body?.length ?? 0 },
      'httpcloak request complete'
    );

    const result: HttpResponse = {
      success: response.ok,
      statusCode: response.statusCode,
      body: body ?? '',
      headers,
    };
    // Not every httpcloak release reports the post-redirect URL
    const finalUrl: unknown = 'url' in response ? response.url : undefined;
    if (typeof finalUrl === 'string' && finalUrl) result.finalUrl = finalUrl;
    return result;
  } catch (error) {
    const message = String(error);
    const timedOut = error instanceof RequestTimeoutError || /timed? ?out/i.test(message);
    logger.warn({ url, error: message }, 'httpcloak request failed');
    return {
      success: false,
      statusCode: 0,
      headers: {},
      error: timedOut ? 'timeout' : 'network',
      message,
    };
  } finally {
    timeout.cancel();
    if (meta) meta.inFlightRequests--;
  }
}
