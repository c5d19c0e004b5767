/**
 * Main crawl orchestrator: an AsyncGenerator that yields a PageEvent per visited
 * URL and a closing RunSummary.
 *
 * The generator's loop is the only code that touches the frontier and the
 * bundle; visits run concurrently but only report back through the race below.
 */
import { validateSeedUrl, type ScrapeConfig } from '../config.js';
import { BundleBuilder } from '../export/bundle.js';
import type { ExportBundle, RunMode } from '../export/types.js';
import { runLogger } from '../logger.js';
import { createEngine, visitPage, type Engine, type Visit } from './engine.js';
import type { FrontierEntry } from './url-frontier.js';
import { UrlFrontier } from './url-frontier.js';
import type { PageEvent, RunEvent, RunOptions, RunSummary } from './types.js';

interface Settled {
  id: number;
  entry: FrontierEntry;
  visit: Visit;
}

export interface FrontierRun {
  mode: RunMode;
  engine: Engine;
  frontier: UrlFrontier;
  /** Feed extracted links back into the frontier (crawl mode). */
  followLinks: boolean;
}

/**
 * Drain a frontier with sliding-window concurrency control.
 * Uses a Map-based inflight tracker so that each completed visit immediately
 * frees a slot for the next URL, rather than waiting for a whole batch.
 */
export async function* runFrontier(run: FrontierRun): AsyncGenerator<RunEvent, void, undefined> {
  const { mode, engine, frontier, followLinks } = run;
  const { clock, log, signal } = engine;
  const concurrency = engine.config.maxConcurrentFetches;
  const startTime = clock.now();
  const bundle = new BundleBuilder(mode, new Date(startTime));

  let pagesSuccess = 0;
  let pagesFailed = 0;
  let pagesBlocked = 0;

  let nextId = 0;
  const inflight = new Map<number, Promise<Settled>>();

  function dispatch(): void {
    while (inflight.size < concurrency && frontier.hasMore()) {
      if (signal?.aborted) return;
      const entry = frontier.next();
      if (!entry) break;
      const id = nextId++;

      const promise = visitPage(engine, entry.url).then(
        (visit) => ({ id, entry, visit }),
        (error: unknown): Settled => {
          log.error({ url: entry.url, error: String(error) }, 'Unexpected error during visit');
          return {
            id,
            entry,
            visit: {
              outcome: {
                ok: false,
                failure: {
                  ok: false,
                  url: entry.url,
                  kind: 'network_error',
                  retriable: false,
                  message: String(error),
                  elapsedMs: 0,
                  attempts: 0,
                },
              },
              links: [],
            },
          };
        }
      );
      inflight.set(id, promise);
    }
  }

  // Fill initial window
  dispatch();

  while (inflight.size > 0) {
    const settled = await Promise.race(inflight.values());
    inflight.delete(settled.id);
    const { entry, visit } = settled;
    const { outcome } = visit;

    if (outcome.ok) {
      frontier.markSucceeded(entry.url);
      bundle.addRecord(outcome.record);
      pagesSuccess++;
      if (followLinks && !signal?.aborted) {
        frontier.addAll(visit.links, entry.depth + 1);
      }
    } else {
      frontier.markFailed(entry.url);
      bundle.addError(outcome.failure);
      if (outcome.failure.kind === 'disallowed_by_robots') pagesBlocked++;
      else pagesFailed++;
    }

    const event: PageEvent = {
      type: 'page',
      url: entry.url,
      depth: entry.depth,
      outcome,
      queued: frontier.queuedCount,
      visited: frontier.visitedCount,
    };
    yield event;

    // Refill window; dispatch() stops once the run is cancelled
    dispatch();
  }

  const cancelled = signal?.aborted ?? false;
  const durationMs = clock.now() - startTime;
  if (cancelled) {
    log.warn({ visited: frontier.visitedCount, queued: frontier.queuedCount }, 'Run cancelled');
  }
  log.info({ pagesSuccess, pagesFailed, pagesBlocked, durationMs }, 'Run finished');

  const summary: RunSummary = {
    type: 'summary',
    mode,
    pagesTotal: pagesSuccess + pagesFailed + pagesBlocked,
    pagesSuccess,
    pagesFailed,
    pagesBlocked,
    durationMs,
    cancelled,
    sitemaps: engine.robots?.sitemapUrls() ?? [],
    bundle: bundle.build(cancelled, new Date(clock.now())),
  };
  yield summary;
}

/**
 * Crawl a website breadth-first from `seedUrl`.
 * Throws ConfigError for a malformed seed before anything is fetched.
 */
export async function* crawl(
  seedUrl: string,
  config: ScrapeConfig,
  options: RunOptions = {}
): AsyncGenerator<RunEvent, void, undefined> {
  const seed = validateSeedUrl(seedUrl).href;
  const log = runLogger('crawl');
  const engine = createEngine(config, options, log);

  const frontier = new UrlFrontier(seed, {
    maxDepth: config.maxDepth,
    maxPages: config.maxPages,
    allowCrossDomain: config.allowCrossDomain,
    includeSubdomains: config.includeSubdomains,
    include: config.include,
    exclude: config.exclude,
    skipExtensions: config.skipExtensions,
  });

  log.info(
    {
      seedUrl: seed,
      maxDepth: config.maxDepth,
      maxPages: config.maxPages,
      concurrency: config.maxConcurrentFetches,
    },
    'Starting crawl'
  );

  yield* runFrontier({ mode: 'crawl', engine, frontier, followLinks: true });
}

/** Consume a run and return its bundle. */
export async function collectBundle(
  events: AsyncGenerator<RunEvent, void, undefined>
): Promise<ExportBundle> {
  for await (const event of events) {
    if (event.type === 'summary') return event.bundle;
  }
  throw new Error('Run ended without a summary');
}

/** Crawl and return the aggregated bundle. */
export function crawlSite(
  seedUrl: string,
  config: ScrapeConfig,
  options: RunOptions = {}
): Promise<ExportBundle> {
  return collectBundle(crawl(seedUrl, config, options));
}
