/**
 * Parse robots.txt into per-agent rules and match URL paths against them
 */

export interface RobotsRule {
  allow: boolean;
  pattern: string;
}

export interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
  crawlDelaySeconds?: number;
}

export interface RobotsRules {
  groups: RobotsGroup[];
  sitemapUrls: string[];
}

/**
 * Parse robots.txt content.
 * Consecutive User-agent lines share one group; Sitemap lines are global.
 */
export function parseRobotsTxt(content: string): RobotsRules {
  const groups: RobotsGroup[] = [];
  const sitemapUrls: string[] = [];
  let current: RobotsGroup | null = null;
  let lastWasAgent = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const field = line.slice(0, colonIdx).trim().toLowerCase();
    const value = line.slice(colonIdx + 1).trim();

    if (field === 'user-agent') {
      if (!current || !lastWasAgent) {
        current = { agents: [], rules: [] };
        groups.push(current);
      }
      current.agents.push(value.toLowerCase());
      lastWasAgent = true;
      continue;
    }
    lastWasAgent = false;

    if (field === 'sitemap') {
      if (value) sitemapUrls.push(value);
      continue;
    }

    if (!current) continue;

    if (field === 'disallow' || field === 'allow') {
      // An empty Disallow means "allow everything" and adds no rule
      if (value) current.rules.push({ allow: field === 'allow', pattern: value });
    } else if (field === 'crawl-delay') {
      const seconds = parseFloat(value);
      if (!isNaN(seconds) && seconds >= 0) current.crawlDelaySeconds = seconds;
    }
  }

  return { groups, sitemapUrls };
}

/**
 * Pick the group for a user-agent token: an agent whose name is contained in
 * the token (case-insensitive), falling back to the "*" group.
 */
export function selectGroup(rules: RobotsRules, userAgent: string): RobotsGroup | null {
  const token = userAgent.toLowerCase();
  let wildcard: RobotsGroup | null = null;

  for (const group of rules.groups) {
    for (const agent of group.agents) {
      if (agent === '*') {
        wildcard ??= group;
      } else if (agent && token.includes(agent)) {
        return group;
      }
    }
  }
  return wildcard;
}

const patternCache = new Map<string, RegExp>();

/** Compile a robots path pattern (`*` wildcard, trailing `$` anchor) to a RegExp. */
function compilePattern(pattern: string): RegExp {
  let regex = patternCache.get(pattern);
  if (!regex) {
    const anchored = pattern.endsWith('$');
    const body = (anchored ? pattern.slice(0, -1) : pattern)
      .split('*')
      .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
      .join('.*');
    regex = new RegExp(`^${body}${anchored ? '$' : ''}`);
    patternCache.set(pattern, regex);
  }
  return regex;
}

/**
 * Check a path (with query) against a group's rules.
 * The longest matching pattern wins; Allow wins a tie; no match means allowed.
 */
export function isPathAllowed(path: string, group: RobotsGroup | null): boolean {
  if (!group) return true;

  let best: RobotsRule | null = null;
  for (const rule of group.rules) {
    if (!compilePattern(rule.pattern).test(path)) continue;
    if (
      !best ||
      rule.pattern.length > best.pattern.length ||
      (rule.pattern.length === best.pattern.length && rule.allow)
    ) {
      best = rule;
    }
  }
  return best ? best.allow : true;
}

/** Check a full URL against the rules for a user-agent. Unparseable URLs are refused. */
export function isAllowedByRobots(url: string, rules: RobotsRules, userAgent: string): boolean {
  let target: URL;
  try {
    target = new URL(url);
  } catch {
    return false;
  }
  return isPathAllowed(target.pathname + target.search, selectGroup(rules, userAgent));
}
