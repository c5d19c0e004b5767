/**
 * Retry with capped exponential backoff around fetchOnce.
 *
 * State: the attempt counter. Each attempt re-acquires the host's politeness
 * gate; a retriable failure waits min(base * 2^attempt, cap) before the next
 * attempt. Exhaustion returns the last failure instead of throwing.
 */
import { logger, type Log } from '../logger.js';
import { AbortedError, systemClock, type Clock } from '../politeness/clock.js';
import type { HostRateLimiter } from '../politeness/rate-limiter.js';
import { createFetchRequest, fetchOnce } from './fetcher.js';
import type { FetchFailure, FetchResult, HttpTransport } from './types.js';

export interface RetryPolicy {
  /** Retries after the first attempt; total requests are maxRetries + 1. */
  maxRetries: number;
  baseDelayMs: number;
  maxBackoffMs: number;
}

export interface FetchContext {
  transport: HttpTransport;
  limiter: HostRateLimiter;
  retry: RetryPolicy;
  timeoutMs: number;
  clock?: Clock;
  userAgent?: string;
  preset?: string;
  signal?: AbortSignal;
  log?: Log;
}

/** Backoff before retry number `attempt + 1` (attempt is 0-indexed). */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxBackoffMs);
}

/** Failure reported when the run is cancelled mid-fetch. */
export function cancelledFailure(url: string, attempts: number, elapsedMs: number): FetchFailure {
  return {
    ok: false,
    url,
    kind: 'cancelled',
    retriable: false,
    message: 'Cancelled before completion',
    elapsedMs,
    attempts,
  };
}

/**
 * Fetch a URL politely, retrying transient failures.
 * Never throws; cancellation yields a `cancelled` failure.
 */
export async function fetchWithRetry(url: string, ctx: FetchContext): Promise<FetchResult> {
  const clock = ctx.clock ?? systemClock;
  const log = ctx.log ?? logger;
  const startTime = clock.now();
  const request0 = createFetchRequest(url);

  for (let attempt = 0; ; attempt++) {
    if (ctx.signal?.aborted) return cancelledFailure(url, attempt, clock.now() - startTime);

    try {
      await ctx.limiter.acquire(request0.domain, ctx.signal);
    } catch (e) {
      if (e instanceof AbortedError) return cancelledFailure(url, attempt, clock.now() - startTime);
      throw e;
    }

    const result = await fetchOnce(createFetchRequest(url, attempt), {
      transport: ctx.transport,
      timeoutMs: ctx.timeoutMs,
      userAgent: ctx.userAgent,
      preset: ctx.preset,
      now: () => clock.now(),
    });

    if (result.ok) {
      if (attempt > 0) log.info({ url, attempts: result.attempts }, 'Fetch succeeded after retry');
      return result;
    }
    if (!result.retriable || attempt >= ctx.retry.maxRetries) {
      log.warn(
        { url, kind: result.kind, statusCode: result.statusCode, attempts: result.attempts },
        'Fetch failed'
      );
      return result;
    }

    const delay = Math.min(
      Math.max(backoffDelay(attempt, ctx.retry), result.retryAfterMs ?? 0),
      ctx.retry.maxBackoffMs
    );
    log.info({ url, attempt: attempt + 1, kind: result.kind, delay }, 'Retrying after transient failure');

    try {
      await clock.sleep(delay, ctx.signal);
    } catch (e) {
      if (e instanceof AbortedError) {
        return cancelledFailure(url, attempt + 1, clock.now() - startTime);
      }
      throw e;
    }
  }
}
