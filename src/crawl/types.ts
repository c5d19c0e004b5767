/**
 * Types shared by the crawl and batch runners
 */
import type { PageRecord } from '../extract/types.js';
import type { ExportBundle, RunMode } from '../export/types.js';
import type { FetchFailure, HttpTransport } from '../fetch/types.js';
import type { Clock } from '../politeness/clock.js';

/** Injection points for a run. Tests pass an in-process transport and a mock clock. */
export interface RunOptions {
  signal?: AbortSignal;
  /** Defaults to the httpcloak client. */
  transport?: HttpTransport;
  clock?: Clock;
  /** Source of jitter; returns a number in [0, 1). */
  random?: () => number;
}

export type PageOutcome = { ok: true; record: PageRecord } | { ok: false; failure: FetchFailure };

/** One visited URL. */
export interface PageEvent {
  type: 'page';
  url: string;
  depth: number;
  outcome: PageOutcome;
  /** Frontier size after this page's links were added. */
  queued: number;
  visited: number;
}

export interface RunSummary {
  type: 'summary';
  mode: RunMode;
  pagesTotal: number;
  pagesSuccess: number;
  pagesFailed: number;
  pagesBlocked: number;
  durationMs: number;
  cancelled: boolean;
  /** Sitemap URLs declared in the robots.txt files read during the run. */
  sitemaps: string[];
  bundle: ExportBundle;
}

export type RunEvent = PageEvent | RunSummary;
