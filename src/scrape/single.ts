/**
 * Single-page scrape: one URL through the same robots → fetch → extract
 * pipeline the crawler uses.
 */
import { validateSeedUrl, type ScrapeConfig } from '../config.js';
import { createEngine, visitPage } from '../crawl/engine.js';
import type { PageOutcome, RunOptions } from '../crawl/types.js';
import { runLogger } from '../logger.js';

/**
 * Fetch and extract one page. Throws ConfigError for a malformed URL;
 * every other problem comes back as `{ ok: false, failure }`.
 */
export async function scrapeSingle(
  url: string,
  config: ScrapeConfig,
  options: RunOptions = {}
): Promise<PageOutcome> {
  const target = validateSeedUrl(url).href;
  const log = runLogger('single');
  const engine = createEngine(config, options, log);

  log.info({ url: target }, 'Scraping single page');
  const { outcome } = await visitPage(engine, target);
  return outcome;
}
