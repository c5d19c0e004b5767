/**
 * Cached robots.txt permission policy, fetched once per origin.
 * Fails open: any problem retrieving or parsing robots.txt means "allowed".
 */
import {
  isAllowedByRobots,
  parseRobotsTxt,
  selectGroup,
  type RobotsRules,
} from '../crawl/robots-parser.js';
import type { HttpTransport } from '../fetch/types.js';
import { logger, type Log } from '../logger.js';
import { AbortedError } from './clock.js';
import type { HostRateLimiter } from './rate-limiter.js';

/** Agent token matched against robots.txt User-agent groups. */
export const ROBOTS_AGENT_TOKEN = 'site-harvester';

export interface RobotsPolicyOptions {
  transport: HttpTransport;
  limiter: HostRateLimiter;
  timeoutMs: number;
  userAgent?: string;
  preset?: string;
  /** Cap applied to Crawl-delay before it reaches the rate limiter. */
  maxCrawlDelayMs: number;
  log?: Log;
}

export class RobotsPolicy {
  private readonly cache = new Map<string, Promise<RobotsRules | null>>();
  private readonly sitemaps = new Set<string>();
  private readonly agentToken: string;
  private readonly log: Log;

  constructor(private readonly options: RobotsPolicyOptions) {
    this.agentToken = options.userAgent ?? ROBOTS_AGENT_TOKEN;
    this.log = options.log ?? logger;
  }

  /**
   * Whether robots.txt permits fetching `url`.
   * Only a run cancellation (AbortedError) propagates; everything else allows.
   */
  async isAllowed(url: string, signal?: AbortSignal): Promise<boolean> {
    let target: URL;
    try {
      target = new URL(url);
    } catch {
      return false;
    }

    const rules = await this.rulesFor(target, signal);
    if (!rules) return true;
    return isAllowedByRobots(url, rules, this.agentToken);
  }

  /** Sitemap URLs declared by every robots.txt read so far, in discovery order. */
  sitemapUrls(): string[] {
    return [...this.sitemaps];
  }

  private rulesFor(target: URL, signal?: AbortSignal): Promise<RobotsRules | null> {
    let pending = this.cache.get(target.origin);
    if (!pending) {
      pending = this.load(target, signal);
      this.cache.set(target.origin, pending);
      // A cancelled load must not poison the cache for a later run
      void pending.catch(() => this.cache.delete(target.origin));
    }
    return pending;
  }

  private async load(target: URL, signal?: AbortSignal): Promise<RobotsRules | null> {
    const robotsUrl = `${target.origin}/robots.txt`;
    const host = target.hostname.toLowerCase();

    await this.options.limiter.acquire(host, signal);

    try {
      const headers: Record<string, string> = {};
      if (this.options.userAgent) headers['User-Agent'] = this.options.userAgent;
      const response = await this.options.transport(robotsUrl, {
        timeoutMs: this.options.timeoutMs,
        headers,
        preset: this.options.preset,
      });

      if (!response.success || response.statusCode >= 400 || !response.body) {
        this.log.debug({ robotsUrl, statusCode: response.statusCode }, 'No usable robots.txt');
        return null;
      }

      const rules = parseRobotsTxt(response.body);
      for (const sitemap of rules.sitemapUrls) this.sitemaps.add(sitemap);
      const crawlDelay = selectGroup(rules, this.agentToken)?.crawlDelaySeconds;
      if (crawlDelay !== undefined) {
        const delayMs = Math.min(crawlDelay * 1000, this.options.maxCrawlDelayMs);
        this.options.limiter.setHostDelay(host, delayMs);
      }

      this.log.debug(
        { robotsUrl, groups: rules.groups.length, crawlDelay, sitemaps: rules.sitemapUrls.length },
        'Parsed robots.txt'
      );
      return rules;
    } catch (e) {
      if (e instanceof AbortedError) throw e;
      this.log.warn({ robotsUrl, error: String(e) }, 'Could not read robots.txt, allowing all paths');
      return null;
    }
  }
}
