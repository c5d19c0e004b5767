/**
 * Extract and resolve links from a parsed document
 */
import {
  emptySocialLinks,
  MAX_ANCHOR_TEXT_LENGTH,
  SOCIAL_PLATFORMS,
  type LinkDetail,
  type SocialLinks,
  type SocialPlatform,
} from './types.js';
import { collapseWhitespace, resolveHttpUrl } from './utils.js';

/** Registrable domains per platform; subdomains (www., m.) match too. */
const SOCIAL_DOMAINS: Record<SocialPlatform, readonly string[]> = {
  facebook: ['facebook.com', 'fb.com'],
  twitter: ['twitter.com', 'x.com'],
  linkedin: ['linkedin.com'],
  instagram: ['instagram.com'],
  youtube: ['youtube.com', 'youtu.be'],
  pinterest: ['pinterest.com'],
};

/**
 * Base URL for relative references: the document's <base href> resolved
 * against the page URL, or the page URL itself.
 */
export function resolveBaseUrl(document: Document, pageUrl: string): string {
  const baseHref = document.querySelector('base[href]')?.getAttribute('href');
  return resolveHttpUrl(baseHref, pageUrl) ?? pageUrl;
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname;
  } catch {
    return null;
  }
}

/**
 * Links from <a href> and <area href> with their anchor text.
 * Resolves relative URLs, strips fragments, and keeps the first anchor per URL.
 * `internal` compares hosts with `pageUrl`.
 */
export function extractLinkDetails(
  document: Document,
  baseUrl: string,
  pageUrl: string = baseUrl
): LinkDetail[] {
  const pageHost = hostOf(pageUrl);
  const seen = new Set<string>();
  const details: LinkDetail[] = [];

  for (const anchor of document.querySelectorAll('a[href], area[href]')) {
    const resolved = resolveHttpUrl(anchor.getAttribute('href'), baseUrl);
    if (!resolved) continue;

    const url = new URL(resolved);
    url.hash = '';
    if (seen.has(url.href)) continue;
    seen.add(url.href);

    const text = collapseWhitespace(anchor.textContent ?? '').slice(0, MAX_ANCHOR_TEXT_LENGTH);
    details.push({ url: url.href, text, internal: url.hostname === pageHost });
  }

  return details;
}

/** Absolute HTTP(S) link URLs, fragment-free and unique in discovery order. */
export function extractLinks(document: Document, baseUrl: string): string[] {
  return extractLinkDetails(document, baseUrl).map((link) => link.url);
}

function platformOf(url: URL): SocialPlatform | null {
  const host = url.hostname;
  for (const platform of SOCIAL_PLATFORMS) {
    if (SOCIAL_DOMAINS[platform].some((domain) => host === domain || host.endsWith(`.${domain}`))) {
      return platform;
    }
  }
  return null;
}

/**
 * Group links pointing at a profile or post on a known social platform.
 * Bare home pages (path "/") are not counted.
 */
export function extractSocialLinks(links: readonly string[]): SocialLinks {
  const social = emptySocialLinks();
  for (const link of links) {
    const url = new URL(link);
    if (url.pathname === '/' && !url.search) continue;
    const platform = platformOf(url);
    if (platform) social[platform].push(link);
  }
  return social;
}

/** Addresses from mailto: links, without query parameters. */
export function extractMailtoAddresses(document: Document): string[] {
  const addresses: string[] = [];
  for (const anchor of document.querySelectorAll('a[href]')) {
    const href = anchor.getAttribute('href')?.trim() ?? '';
    if (!/^mailto:/i.test(href)) continue;

    const target = href.slice('mailto:'.length).split('?')[0];
    for (const address of target.split(',')) {
      let decoded: string;
      try {
        decoded = decodeURIComponent(address).trim();
      } catch {
        decoded = address.trim();
      }
      if (decoded) addresses.push(decoded);
    }
  }
  return addresses;
}
