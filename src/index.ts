/**
 * site-harvester - polite crawling and scraping with structured extraction
 * and JSON / CSV / Excel export.
 *
 * @module site-harvester
 */
export { scrapeSingle, scrapeBatch, batch } from './scrape/index.js';
export { crawl, crawlSite } from './crawl/index.js';
export { exportBundle, BundleBuilder, bundleRecords } from './export/index.js';
export { extract, buildPageRecord } from './extract/index.js';
export { fetchWithRetry, fetchOnce, httpRequest, closeAllSessions } from './fetch/index.js';
export { HostRateLimiter } from './politeness/rate-limiter.js';
export { RobotsPolicy } from './politeness/robots-policy.js';
export { systemClock, AbortedError } from './politeness/clock.js';
export { UrlFrontier, normalizeUrl } from './crawl/index.js';
export { resolveConfig, loadConfigFile, EXPORT_FORMATS } from './config.js';
export { ConfigError, ExportError } from './errors.js';
export type { ScrapeConfig, ScrapeConfigInput, ExportFormat } from './config.js';
export type { PageEvent, PageOutcome, RunEvent, RunOptions, RunSummary } from './crawl/types.js';
export type {
  BundleEntry,
  ExportBundle,
  ExportOptions,
  ExportReport,
  RunMode,
} from './export/types.js';
export type {
  ExtractedPage,
  FormDetail,
  FormField,
  ImageDetail,
  LinkDetail,
  PageLists,
  PageRecord,
  SocialLinks,
  SocialPlatform,
} from './extract/index.js';
export type { FetchFailure, FetchResult, FetchSuccess, HttpTransport } from './fetch/types.js';
export type { Clock } from './politeness/clock.js';
