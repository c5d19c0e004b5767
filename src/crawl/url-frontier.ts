/**
 * BFS URL frontier with normalization, per-URL state, scope, depth/page bounds,
 * and pattern filtering.
 *
 * A URL is enqueued only if it was never seen, its depth is within maxDepth,
 * and |queued| + |visited| < maxPages. Hence |visited| never exceeds maxPages.
 */
import picomatch from 'picomatch';
import { DEFAULT_SKIP_EXTENSIONS } from '../config.js';

export type UrlState = 'queued' | 'fetching' | 'succeeded' | 'failed';

export interface FrontierEntry {
  url: string;
  depth: number;
}

export interface FrontierOptions {
  maxDepth: number;
  maxPages: number;
  allowCrossDomain?: boolean;
  includeSubdomains?: boolean;
  include?: string[];
  exclude?: string[];
  skipExtensions?: string[];
}

/**
 * Normalize a URL for deduplication.
 * Lowercases scheme+host and drops the default port (WHATWG URL does both),
 * strips fragments, removes trailing slashes (except root).
 * Unparseable input is returned unchanged.
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.hash = '';

    // Remove trailing slash unless it's the root path
    if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
      parsed.pathname = parsed.pathname.slice(0, -1);
    }

    return parsed.href;
  } catch {
    return url;
  }
}

/** Whether `host` equals `domain` or, with `subdomains`, ends in `.domain`. */
export function isInScope(host: string, domain: string, subdomains: boolean): boolean {
  const h = host.toLowerCase();
  return h === domain || (subdomains && h.endsWith(`.${domain}`));
}

export class UrlFrontier {
  private readonly states = new Map<string, UrlState>();
  private readonly queue: FrontierEntry[] = [];
  private readonly scopeDomain: string;
  private readonly maxDepth: number;
  private readonly maxPages: number;
  private readonly allowCrossDomain: boolean;
  private readonly includeSubdomains: boolean;
  private readonly skipExtensions: string[];
  private readonly includeMatcher: ((path: string) => boolean) | null;
  private readonly excludeMatcher: ((path: string) => boolean) | null;
  private visited = 0;

  constructor(seedUrl: string, options: FrontierOptions) {
    this.scopeDomain = new URL(seedUrl).hostname.toLowerCase();
    this.maxDepth = options.maxDepth;
    this.maxPages = options.maxPages;
    this.allowCrossDomain = options.allowCrossDomain ?? false;
    this.includeSubdomains = options.includeSubdomains ?? false;
    this.skipExtensions = (options.skipExtensions ?? DEFAULT_SKIP_EXTENSIONS).map((ext) =>
      ext.toLowerCase()
    );

    this.includeMatcher =
      options.include && options.include.length > 0
        ? picomatch(options.include, { dot: true })
        : null;

    this.excludeMatcher =
      options.exclude && options.exclude.length > 0
        ? picomatch(options.exclude, { dot: true })
        : null;

    this.add(seedUrl, 0);
  }

  /** Add a URL to the frontier if it passes all filters. Returns whether it was queued. */
  add(url: string, depth: number): boolean {
    if (depth > this.maxDepth) return false;
    if (this.queue.length + this.visited >= this.maxPages) return false;

    let parsed: URL;
    try {
      parsed = new URL(normalizeUrl(url));
    } catch {
      return false;
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;

    const normalized = parsed.href;
    if (this.states.has(normalized)) return false;

    if (
      !this.allowCrossDomain &&
      !isInScope(parsed.hostname, this.scopeDomain, this.includeSubdomains)
    ) {
      return false;
    }

    const path = parsed.pathname.toLowerCase();
    if (this.skipExtensions.some((ext) => path.endsWith(ext))) return false;
    if (this.includeMatcher && !this.includeMatcher(parsed.pathname)) return false;
    if (this.excludeMatcher && this.excludeMatcher(parsed.pathname)) return false;

    this.states.set(normalized, 'queued');
    this.queue.push({ url: normalized, depth });
    return true;
  }

  /** Add multiple URLs at the same depth. Returns how many were queued. */
  addAll(urls: Iterable<string>, depth: number): number {
    let added = 0;
    for (const url of urls) {
      if (this.add(url, depth)) added++;
    }
    return added;
  }

  /** Pop the oldest queued URL and mark it fetching, or null when the queue is empty. */
  next(): FrontierEntry | null {
    const entry = this.queue.shift();
    if (!entry) return null;
    this.states.set(entry.url, 'fetching');
    this.visited++;
    return entry;
  }

  markSucceeded(url: string): void {
    this.settle(url, 'succeeded');
  }

  markFailed(url: string): void {
    this.settle(url, 'failed');
  }

  private settle(url: string, state: 'succeeded' | 'failed'): void {
    if (this.states.get(url) !== 'fetching') {
      throw new Error(`URL is not being fetched: ${url}`);
    }
    this.states.set(url, state);
  }

  stateOf(url: string): UrlState | undefined {
    return this.states.get(normalizeUrl(url));
  }

  hasMore(): boolean {
    return this.queue.length > 0;
  }

  /** URLs dequeued so far (fetching, succeeded or failed). */
  get visitedCount(): number {
    return this.visited;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /** Snapshot of the queued URLs in FIFO order. */
  queuedUrls(): string[] {
    return this.queue.map((entry) => entry.url);
  }
}
