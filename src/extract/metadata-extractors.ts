/**
 * Metadata extraction helpers: title, description, keywords, language, meta tags, headings.
 */
import type { Headings } from './types.js';
import { collapseWhitespace } from './utils.js';

function textOf(el: Element | null): string {
  return collapseWhitespace(el?.textContent ?? '');
}

/**
 * Extract title: the <title> tag, else the first non-empty <h1>, else null.
 */
export function extractTitle(document: Document): string | null {
  const title = textOf(document.querySelector('title'));
  if (title) return title;

  for (const h1 of document.querySelectorAll('h1')) {
    const text = textOf(h1);
    if (text) return text;
  }

  return null;
}

/**
 * Collect meta[name] and meta[property] tags with content, in document order.
 * The first occurrence of a key wins.
 */
export function extractMetaTags(document: Document): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const meta of document.querySelectorAll('meta')) {
    const key = (meta.getAttribute('name') ?? meta.getAttribute('property'))?.trim().toLowerCase();
    const content = meta.getAttribute('content')?.trim();
    if (key && content && !(key in tags)) {
      tags[key] = content;
    }
  }
  return tags;
}

/**
 * Extract description from meta tags (description, then og:description)
 */
export function extractDescription(meta: Record<string, string>): string | null {
  return meta['description'] ?? meta['og:description'] ?? null;
}

export function extractKeywords(meta: Record<string, string>): string | null {
  return meta['keywords'] ?? null;
}

/**
 * Extract document language from <html lang>, falling back to og:locale
 */
export function extractLang(document: Document, meta: Record<string, string>): string | null {
  const lang = document.documentElement?.getAttribute('lang')?.trim();
  return lang || meta['og:locale'] || null;
}

/** Non-empty h1–h3 texts per level, in document order. */
export function extractHeadings(document: Document): Headings {
  const headings: Headings = { h1: [], h2: [], h3: [] };
  for (const level of ['h1', 'h2', 'h3'] as const) {
    for (const el of document.querySelectorAll(level)) {
      const text = textOf(el);
      if (text) headings[level].push(text);
    }
  }
  return headings;
}
