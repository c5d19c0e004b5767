/**
 * JSON-LD structured data embedded in <script type="application/ld+json">
 */
import { logger } from '../logger.js';

/**
 * Parse every JSON-LD block in document order. Each block contributes one
 * value as written (objects, arrays and @graph wrappers are kept intact).
 * Malformed blocks are skipped.
 */
export function extractJsonLd(document: Document): unknown[] {
  const items: unknown[] = [];
  const scripts = document.querySelectorAll('script[type="application/ld+json"]');
  for (const script of scripts) {
    const source = script.textContent?.trim() ?? '';
    if (!source) continue;
    try {
      items.push(JSON.parse(source));
    } catch (e) {
      logger.debug({ error: String(e) }, 'Skipping malformed JSON-LD block');
    }
  }
  return items;
}
