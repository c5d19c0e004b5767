/**
 * Utility functions for the extract module
 */

/** Regex matching CJK characters (CJK Unified, Hiragana, Katakana, Hangul, fullwidth forms). */
const CJK_CHAR =
  /[\u3000-\u303f\u3040-\u309f\u30a0-\u30ff\u4e00-\u9fff\uac00-\ud7af\uff00-\uffef]/g;

/**
 * Count words in text. CJK characters are counted individually since
 * CJK scripts do not use whitespace to delimit words.
 */
export function countWords(text: string | null): number {
  if (!text) return 0;
  // Insert spaces around CJK characters so each counts as a separate word,
  // then perform a standard whitespace-based word count.
  const spaced = text.replace(CJK_CHAR, ' $& ');
  return spaced.trim().split(/\s+/).filter(Boolean).length;
}

/** Collapse runs of whitespace (including newlines and nbsp) into single spaces. */
export function collapseWhitespace(text: string): string {
  return text.replace(/[\s\u00a0]+/g, ' ').trim();
}

/** Truncate to `max` characters, marking the cut with "...". */
export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + '...' : text;
}

/** Drop duplicates while keeping first-seen order. */
export function uniqueInOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * Resolve a potentially relative URL against a base URL, keeping only http(s).
 * Returns null if the URL is empty, invalid, or uses another scheme.
 */
export function resolveHttpUrl(url: string | null | undefined, baseUrl: string): string | null {
  const trimmed = url?.trim();
  if (!trimmed) return null;
  try {
    const resolved = new URL(trimmed, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
    return resolved.href;
  } catch {
    return null;
  }
}
