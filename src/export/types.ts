/**
 * Types for the export module
 */
import type { ExportFormat } from '../config.js';
import type { PageRecord } from '../extract/types.js';
import type { FetchFailure } from '../fetch/types.js';

export type RunMode = 'single' | 'crawl' | 'batch';

export type BundleEntry =
  | { type: 'record'; record: PageRecord }
  | { type: 'error'; url: string; error: FetchFailure };

/**
 * Everything one run produced, keyed by normalized source URL in the order
 * the URLs were visited. Frozen once built.
 */
export interface ExportBundle {
  readonly mode: RunMode;
  /** ISO-8601 */
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly cancelled: boolean;
  readonly entries: ReadonlyMap<string, BundleEntry>;
}

export interface ExportFailure {
  format: ExportFormat;
  message: string;
}

export interface ExportReport {
  /** Files written, in the order of the requested formats. */
  paths: string[];
  failures: ExportFailure[];
}

export interface ExportOptions {
  /** Output directory, created when missing. Defaults to the working directory. */
  directory?: string;
  /** Fixed timestamp for file names, or false to leave it out. Defaults to now. */
  timestamp?: Date | false;
}
