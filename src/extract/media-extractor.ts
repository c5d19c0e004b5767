/**
 * Image extraction from a parsed document, in document order.
 */
import type { ImageDetail } from './types.js';
import { collapseWhitespace, resolveHttpUrl } from './utils.js';

/** Attributes carrying the real source on lazy-loaded images, in preference order. */
const LAZY_SRC_ATTRIBUTES = ['data-src', 'data-lazy-src', 'data-original'];

/**
 * Parse srcset and return the URL with the largest descriptor.
 * Width descriptors (w) are preferred over density descriptors (x).
 */
export function parseSrcsetLargest(srcset: string | null): string | null {
  if (!srcset) return null;

  let bestW: { url: string; size: number } | null = null;
  let bestX: { url: string; size: number } | null = null;

  for (const candidate of srcset.split(',')) {
    const [url, descriptor = '1x'] = candidate.trim().split(/\s+/);
    if (!url) continue;

    const size = parseFloat(descriptor);
    if (isNaN(size)) continue;

    if (descriptor.endsWith('w')) {
      if (!bestW || size > bestW.size) bestW = { url, size };
    } else if (!bestX || size > bestX.size) {
      bestX = { url, size };
    }
  }

  return bestW?.url ?? bestX?.url ?? null;
}

/**
 * Best source for an <img>: src, then lazy-load attributes, then srcset.
 * data: URIs are ignored.
 */
function getImageSrc(img: Element): string | null {
  const candidates = [
    img.getAttribute('src'),
    ...LAZY_SRC_ATTRIBUTES.map((attr) => img.getAttribute(attr)),
    parseSrcsetLargest(img.getAttribute('srcset')),
  ];
  for (const candidate of candidates) {
    const value = candidate?.trim();
    if (value && !value.startsWith('data:')) return value;
  }
  return null;
}

function attributeText(el: Element, name: string): string | null {
  const value = collapseWhitespace(el.getAttribute(name) ?? '');
  return value || null;
}

/** Images with their alt and title text, in document order. */
export function extractImageDetails(document: Document, baseUrl: string): ImageDetail[] {
  const images: ImageDetail[] = [];
  for (const img of document.querySelectorAll('img')) {
    const src = resolveHttpUrl(getImageSrc(img), baseUrl);
    if (!src) continue;
    images.push({ src, alt: attributeText(img, 'alt'), title: attributeText(img, 'title') });
  }
  return images;
}

/**
 * Absolute URLs of all images in document order. Repeats are kept:
 * the sequence mirrors the page.
 */
export function extractImages(document: Document, baseUrl: string): string[] {
  return extractImageDetails(document, baseUrl).map((image) => image.src);
}
