import { describe, it, expect, vi } from 'vitest';

vi.mock('../logger.js', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger: log, runLogger: vi.fn(() => log) };
});

import { crawl, crawlSite } from '../crawl/crawler.js';
import type { PageEvent, RunEvent, RunSummary } from '../crawl/types.js';
import { ConfigError } from '../errors.js';
import type { HttpResponse, HttpTransport } from '../fetch/types.js';
import {
  fakeTransport,
  htmlResponse,
  ManualClock,
  pageWithLinks,
  statusResponse,
  testConfig,
  textResponse,
  type Route,
} from './test-helpers.js';

const SEED = 'https://example.com/';

async function collect(events: AsyncGenerator<RunEvent, void, undefined>): Promise<{
  pages: PageEvent[];
  summary: RunSummary;
}> {
  const pages: PageEvent[] = [];
  for await (const event of events) {
    if (event.type === 'summary') return { pages, summary: event };
    pages.push(event);
  }
  throw new Error('no summary');
}

/** A site where every page links to `fanout` new pages. */
function generatedSite(fanout: number): Record<string, Route> {
  const routes: Record<string, Route> = {};
  const queue = [SEED];
  let next = 0;
  while (queue.length > 0 && next < 200) {
    const url = queue.shift() ?? SEED;
    const children = Array.from({ length: fanout }, () => `https://example.com/p${next++}`);
    routes[url] = htmlResponse(pageWithLinks(url, children));
    queue.push(...children);
  }
  return routes;
}

describe('crawl orchestrator', () => {
  describe('BFS link discovery', () => {
    it('queues exactly the three same-domain links of the seed', async () => {
      const fake = fakeTransport({
        [SEED]: htmlResponse(
          pageWithLinks('Home', [
            'https://example.com/a',
            'https://example.com/b',
            'https://external.test/x',
            'https://example.com/c',
          ])
        ),
        'https://example.com/a': htmlResponse(pageWithLinks('A', ['https://example.com/deeper'])),
        'https://example.com/b': htmlResponse(pageWithLinks('B', [])),
        'https://example.com/c': htmlResponse(pageWithLinks('C', [])),
      });

      const { pages, summary } = await collect(
        crawl(SEED, testConfig({ maxDepth: 1, maxPages: 5 }), {
          transport: fake.transport,
          clock: new ManualClock(),
        })
      );

      expect(pages[0]).toMatchObject({ url: SEED, depth: 0, queued: 3, visited: 1 });
      expect([...fake.calls].sort()).toEqual([
        SEED,
        'https://example.com/a',
        'https://example.com/b',
        'https://example.com/c',
      ]);
      expect(pages.slice(1).map((p) => p.depth)).toEqual([1, 1, 1]);
      expect(summary).toMatchObject({
        mode: 'crawl',
        pagesTotal: 4,
        pagesSuccess: 4,
        pagesFailed: 0,
        cancelled: false,
      });
      expect(summary.bundle.entries.size).toBe(4);
      expect([...summary.bundle.entries.keys()][0]).toBe(SEED);
    });

    it('never requests a URL twice on a cyclic site', async () => {
      const fake = fakeTransport({
        [SEED]: htmlResponse(pageWithLinks('Home', ['https://example.com/a', 'https://example.com/b'])),
        'https://example.com/a': htmlResponse(
          pageWithLinks('A', [SEED, 'https://example.com/b', 'https://example.com/a#top'])
        ),
        'https://example.com/b': htmlResponse(
          pageWithLinks('B', ['https://example.com/a/', 'https://EXAMPLE.com/'])
        ),
      });

      await crawlSite(SEED, testConfig({ maxDepth: 5, maxPages: 50 }), {
        transport: fake.transport,
        clock: new ManualClock(),
      });

      expect(fake.calls).toHaveLength(3);
      expect(new Set(fake.calls).size).toBe(3);
    });

    it('stops at maxPages', async () => {
      const fake = fakeTransport(generatedSite(10));

      const { pages, summary } = await collect(
        crawl(SEED, testConfig({ maxDepth: 5, maxPages: 7 }), {
          transport: fake.transport,
          clock: new ManualClock(),
        })
      );

      expect(pages).toHaveLength(7);
      expect(fake.calls).toHaveLength(7);
      expect(summary.bundle.entries.size).toBe(7);
    });

    it('stops at maxDepth', async () => {
      const fake = fakeTransport(generatedSite(2));

      const { pages } = await collect(
        crawl(SEED, testConfig({ maxDepth: 2, maxPages: 50 }), {
          transport: fake.transport,
          clock: new ManualClock(),
        })
      );

      // 1 seed + 2 at depth 1 + 4 at depth 2
      expect(pages).toHaveLength(7);
      expect(Math.max(...pages.map((p) => p.depth))).toBe(2);
    });

    it('visits only the seed with maxDepth 0', async () => {
      const fake = fakeTransport(generatedSite(3));

      const bundle = await crawlSite(SEED, testConfig({ maxDepth: 0 }), {
        transport: fake.transport,
        clock: new ManualClock(),
      });

      expect(fake.calls).toEqual([SEED]);
      expect([...bundle.entries.keys()]).toEqual([SEED]);
    });
  });

  describe('failed pages', () => {
    it('records failures in the bundle and keeps crawling', async () => {
      const fake = fakeTransport({
        [SEED]: htmlResponse(pageWithLinks('Home', ['https://example.com/missing', 'https://example.com/ok'])),
        'https://example.com/ok': htmlResponse(pageWithLinks('OK', [])),
      });

      const { summary } = await collect(
        crawl(SEED, testConfig({ maxRetries: 0 }), {
          transport: fake.transport,
          clock: new ManualClock(),
        })
      );

      expect(summary).toMatchObject({ pagesSuccess: 2, pagesFailed: 1, pagesTotal: 3 });
      const entry = summary.bundle.entries.get('https://example.com/missing');
      expect(entry).toMatchObject({
        type: 'error',
        url: 'https://example.com/missing',
        error: { kind: 'http_status_error', statusCode: 404 },
      });
    });

    it('retries transient failures within the crawl', async () => {
      const clock = new ManualClock();
      const fake = fakeTransport({
        [SEED]: [statusResponse(503), htmlResponse(pageWithLinks('Home', []))],
      });

      const bundle = await crawlSite(SEED, testConfig({ maxRetries: 1, baseDelay: 1 }), {
        transport: fake.transport,
        clock,
      });

      expect(bundle.entries.get(SEED)?.type).toBe('record');
      expect(fake.countFor(SEED)).toBe(2);
      expect(clock.sleeps).toContain(1_000);
    });
  });

  describe('robots.txt integration', () => {
    it('skips disallowed URLs without requesting them', async () => {
      const fake = fakeTransport({
        'https://example.com/robots.txt': textResponse(
          'User-agent: *\nDisallow: /private\nSitemap: https://example.com/sitemap.xml'
        ),
        [SEED]: htmlResponse(
          pageWithLinks('Home', ['https://example.com/private/x', 'https://example.com/public'])
        ),
        'https://example.com/public': htmlResponse(pageWithLinks('Public', [])),
      });

      const { summary } = await collect(
        crawl(SEED, testConfig({ respectRobots: true }), {
          transport: fake.transport,
          clock: new ManualClock(),
        })
      );

      expect(fake.countFor('https://example.com/private/x')).toBe(0);
      expect(fake.countFor('https://example.com/robots.txt')).toBe(1);
      expect(summary).toMatchObject({ pagesSuccess: 2, pagesBlocked: 1, pagesFailed: 0 });
      expect(summary.sitemaps).toEqual(['https://example.com/sitemap.xml']);
      expect(summary.bundle.entries.get('https://example.com/private/x')).toMatchObject({
        type: 'error',
        error: { kind: 'disallowed_by_robots', attempts: 0 },
      });
    });

    it('ignores robots.txt when respectRobots is off', async () => {
      const fake = fakeTransport({
        'https://example.com/robots.txt': textResponse('User-agent: *\nDisallow: /'),
        [SEED]: htmlResponse(pageWithLinks('Home', [])),
      });

      const bundle = await crawlSite(SEED, testConfig({ respectRobots: false }), {
        transport: fake.transport,
        clock: new ManualClock(),
      });

      expect(fake.calls).toEqual([SEED]);
      expect(bundle.entries.get(SEED)?.type).toBe('record');
    });
  });

  describe('cancellation', () => {
    it('stops dispatching once the signal aborts and reports a cancelled summary', async () => {
      const controller = new AbortController();
      const fake = fakeTransport(generatedSite(3), (url) => {
        if (url === 'https://example.com/p0') controller.abort();
      });

      const { pages, summary } = await collect(
        crawl(SEED, testConfig({ maxConcurrentFetches: 1 }), {
          transport: fake.transport,
          clock: new ManualClock(),
          signal: controller.signal,
        })
      );

      expect(fake.calls).toEqual([SEED, 'https://example.com/p0']);
      expect(pages.map((p) => p.url)).toEqual([SEED, 'https://example.com/p0']);
      expect(summary.cancelled).toBe(true);
      expect(summary.bundle.cancelled).toBe(true);
      expect(summary.bundle.entries.size).toBe(2);
    });

    it('fetches nothing when cancelled before the start', async () => {
      const controller = new AbortController();
      controller.abort();
      const fake = fakeTransport(generatedSite(3));

      const { pages, summary } = await collect(
        crawl(SEED, testConfig(), {
          transport: fake.transport,
          clock: new ManualClock(),
          signal: controller.signal,
        })
      );

      expect(fake.calls).toEqual([]);
      expect(pages).toEqual([]);
      expect(summary.cancelled).toBe(true);
    });
  });

  describe('concurrency limiting', () => {
    it('never has more than maxConcurrentFetches requests in flight', async () => {
      const site = generatedSite(4);
      let inFlight = 0;
      let peak = 0;
      const transport: HttpTransport = async (url) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 1));
        inFlight--;
        const route = site[url];
        const response: HttpResponse = Array.isArray(route) || !route ? statusResponse(404) : route;
        return response;
      };

      const bundle = await crawlSite(SEED, testConfig({ maxConcurrentFetches: 2, maxPages: 12 }), {
        transport,
        clock: new ManualClock(),
      });

      expect(bundle.entries.size).toBe(12);
      expect(peak).toBeLessThanOrEqual(2);
    });
  });

  describe('input validation', () => {
    it('throws ConfigError for a malformed seed before fetching', async () => {
      const fake = fakeTransport({});
      await expect(
        crawlSite('not a url', testConfig(), { transport: fake.transport })
      ).rejects.toBeInstanceOf(ConfigError);
      expect(fake.calls).toEqual([]);
    });

    it('rejects non-http seeds', async () => {
      await expect(crawlSite('ftp://example.com/', testConfig())).rejects.toThrow(
        'URL must use http or https'
      );
    });
  });
});
