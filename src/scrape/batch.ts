/**
 * Batch scrape: a fixed list of URLs, no link following.
 * Duplicates after normalization are visited once.
 */
import { validateSeedUrl, type ScrapeConfig } from '../config.js';
import { collectBundle, runFrontier } from '../crawl/crawler.js';
import { createEngine } from '../crawl/engine.js';
import type { RunEvent, RunOptions } from '../crawl/types.js';
import { UrlFrontier } from '../crawl/url-frontier.js';
import { ConfigError } from '../errors.js';
import type { ExportBundle } from '../export/types.js';
import { runLogger } from '../logger.js';

/**
 * Check every URL up front so a bad entry fails the run before any fetch.
 * Returns the parsed hrefs in input order.
 */
export function validateBatchUrls(urls: readonly string[]): string[] {
  if (urls.length === 0) throw new ConfigError(['no URLs given']);

  const issues: string[] = [];
  const hrefs: string[] = [];
  for (const url of urls) {
    try {
      hrefs.push(validateSeedUrl(url).href);
    } catch (e) {
      if (!(e instanceof ConfigError)) throw e;
      issues.push(...e.issues);
    }
  }
  if (issues.length > 0) throw new ConfigError(issues);
  return hrefs;
}

export async function* batch(
  urls: readonly string[],
  config: ScrapeConfig,
  options: RunOptions = {}
): AsyncGenerator<RunEvent, void, undefined> {
  const [first, ...rest] = validateBatchUrls(urls);
  const log = runLogger('batch');
  const engine = createEngine(config, options, log);

  // Every listed URL is in scope; only the duplicate check applies.
  const frontier = new UrlFrontier(first, {
    maxDepth: 0,
    maxPages: urls.length,
    allowCrossDomain: true,
    skipExtensions: [],
  });
  frontier.addAll(rest, 0);

  log.info(
    { urls: urls.length, unique: frontier.queuedCount, concurrency: config.maxConcurrentFetches },
    'Starting batch'
  );

  yield* runFrontier({ mode: 'batch', engine, frontier, followLinks: false });
}

/** Scrape every URL and return the aggregated bundle. */
export function scrapeBatch(
  urls: readonly string[],
  config: ScrapeConfig,
  options: RunOptions = {}
): Promise<ExportBundle> {
  return collectBundle(batch(urls, config, options));
}
