/**
 * Run-scoped wiring shared by crawl, batch and single-page modes: one rate
 * limiter, one robots policy, and the visit pipeline
 * (robots check → fetchWithRetry → extract).
 */
import type { ScrapeConfig } from '../config.js';
import { buildPageRecord, extract } from '../extract/page-extractor.js';
import { httpRequest } from '../fetch/http-client.js';
import { cancelledFailure, fetchWithRetry, type FetchContext } from '../fetch/retry.js';
import type { FetchFailure } from '../fetch/types.js';
import type { Log } from '../logger.js';
import { AbortedError, systemClock, type Clock } from '../politeness/clock.js';
import { HostRateLimiter } from '../politeness/rate-limiter.js';
import { RobotsPolicy } from '../politeness/robots-policy.js';
import type { PageOutcome, RunOptions } from './types.js';

export interface Engine {
  config: ScrapeConfig;
  clock: Clock;
  log: Log;
  limiter: HostRateLimiter;
  /** null when robots.txt is ignored. */
  robots: RobotsPolicy | null;
  fetch: FetchContext;
  signal?: AbortSignal;
}

export interface Visit {
  outcome: PageOutcome;
  /** Links of a successfully extracted page; empty otherwise. */
  links: string[];
}

const SECOND = 1000;

export function createEngine(config: ScrapeConfig, options: RunOptions, log: Log): Engine {
  const clock = options.clock ?? systemClock;
  const transport = options.transport ?? httpRequest;
  const timeoutMs = config.timeout * SECOND;

  const limiter = new HostRateLimiter({
    minDelayMs: config.baseDelay * SECOND,
    jitterMs: config.jitter * SECOND,
    clock,
    random: options.random,
  });

  const robots = config.respectRobots
    ? new RobotsPolicy({
        transport,
        limiter,
        timeoutMs,
        userAgent: config.userAgent,
        preset: config.preset,
        maxCrawlDelayMs: config.maxCrawlDelay * SECOND,
        log,
      })
    : null;

  return {
    config,
    clock,
    log,
    limiter,
    robots,
    signal: options.signal,
    fetch: {
      transport,
      limiter,
      retry: {
        maxRetries: config.maxRetries,
        baseDelayMs: config.baseDelay * SECOND,
        maxBackoffMs: config.maxBackoff * SECOND,
      },
      timeoutMs,
      clock,
      userAgent: config.userAgent,
      preset: config.preset,
      signal: options.signal,
      log,
    },
  };
}

function robotsFailure(url: string): FetchFailure {
  return {
    ok: false,
    url,
    kind: 'disallowed_by_robots',
    retriable: false,
    message: 'Disallowed by robots.txt',
    elapsedMs: 0,
    attempts: 0,
  };
}

function failed(failure: FetchFailure): Visit {
  return { outcome: { ok: false, failure }, links: [] };
}

/** Visit one URL. Never throws for per-URL problems. */
export async function visitPage(engine: Engine, url: string): Promise<Visit> {
  const { clock, log } = engine;
  const startTime = clock.now();

  if (engine.robots) {
    let allowed: boolean;
    try {
      allowed = await engine.robots.isAllowed(url, engine.signal);
    } catch (e) {
      if (e instanceof AbortedError) return failed(cancelledFailure(url, 0, clock.now() - startTime));
      throw e;
    }
    if (!allowed) {
      log.debug({ url }, 'Blocked by robots.txt');
      return failed(robotsFailure(url));
    }
  }

  const result = await fetchWithRetry(url, engine.fetch);
  if (!result.ok) return failed(result);

  const page = extract(result.body, url);
  const record = buildPageRecord(page, {
    url,
    status: result.status,
    fetchedAt: new Date(clock.now()).toISOString(),
    contentType: result.headers['content-type'] ?? null,
    finalUrl: result.finalUrl ?? url,
  });
  log.debug({ url, status: result.status, links: page.links.length }, 'Page extracted');
  return { outcome: { ok: true, record }, links: page.links };
}
