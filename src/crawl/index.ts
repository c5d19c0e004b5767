/**
 * Crawl module barrel exports
 */
export { crawl, crawlSite, collectBundle, runFrontier } from './crawler.js';
export { createEngine, visitPage } from './engine.js';
export type { Engine, Visit } from './engine.js';
export { UrlFrontier, normalizeUrl, isInScope } from './url-frontier.js';
export type { FrontierEntry, FrontierOptions, UrlState } from './url-frontier.js';
export { parseRobotsTxt, selectGroup, isPathAllowed, isAllowedByRobots } from './robots-parser.js';
export type { RobotsRules, RobotsGroup, RobotsRule } from './robots-parser.js';
export type { PageEvent, PageOutcome, RunEvent, RunOptions, RunSummary } from './types.js';
