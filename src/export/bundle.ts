/**
 * Accumulates run outcomes into an ExportBundle.
 *
 * Owned by a single control loop; nothing else mutates it while a run is live.
 */
import { normalizeUrl } from '../crawl/url-frontier.js';
import type { PageRecord } from '../extract/types.js';
import type { FetchFailure } from '../fetch/types.js';
import type { BundleEntry, ExportBundle, RunMode } from './types.js';

export class BundleBuilder {
  private readonly entries = new Map<string, BundleEntry>();
  private readonly startedAt: string;

  constructor(
    private readonly mode: RunMode,
    startedAt: Date = new Date()
  ) {
    this.startedAt = startedAt.toISOString();
  }

  addRecord(record: PageRecord): void {
    const entry: BundleEntry = { type: 'record', record };
    this.entries.set(normalizeUrl(record.url), Object.freeze(entry));
  }

  addError(failure: FetchFailure): void {
    const entry: BundleEntry = { type: 'error', url: failure.url, error: Object.freeze({ ...failure }) };
    this.entries.set(normalizeUrl(failure.url), Object.freeze(entry));
  }

  get size(): number {
    return this.entries.size;
  }

  /** Snapshot the entries so far into a frozen bundle. The builder stays usable. */
  build(cancelled: boolean, finishedAt: Date = new Date()): ExportBundle {
    return Object.freeze({
      mode: this.mode,
      startedAt: this.startedAt,
      finishedAt: finishedAt.toISOString(),
      cancelled,
      entries: new Map(this.entries),
    });
  }
}

/** Records of a bundle in key order. */
export function bundleRecords(bundle: ExportBundle): PageRecord[] {
  const records: PageRecord[] = [];
  for (const entry of bundle.entries.values()) {
    if (entry.type === 'record') records.push(entry.record);
  }
  return records;
}
