/**
 * Markup → normalized page content.
 *
 * extract() is total and deterministic: any input, including empty or
 * malformed markup and arbitrary bytes, yields an ExtractedPage. Parse
 * problems degrade to empty fields and are only logged.
 */
import { parseHTML } from 'linkedom';
import { logger } from '../logger.js';
import { extractEmails, extractPhones } from './contacts.js';
import { extractJsonLd } from './json-ld-extractor.js';
import {
  extractLinkDetails,
  extractMailtoAddresses,
  extractSocialLinks,
  resolveBaseUrl,
} from './link-extractor.js';
import { extractImageDetails } from './media-extractor.js';
import {
  extractDescription,
  extractHeadings,
  extractKeywords,
  extractLang,
  extractMetaTags,
  extractTitle,
} from './metadata-extractors.js';
import {
  extractForms,
  extractLists,
  extractParagraphs,
  extractScriptSources,
  extractStylesheets,
  extractTables,
} from './structure-extractors.js';
import {
  emptyPage,
  MAX_HTML_LENGTH,
  MAX_TEXT_LENGTH,
  type ExtractedPage,
  type PageRecord,
} from './types.js';
import { collapseWhitespace, countWords, truncate } from './utils.js';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

/** Elements whose content never reaches the reader. */
const INVISIBLE_SELECTORS = 'script, style, noscript, template';

/** Elements that break the text flow; text on either side must not run together. */
const BLOCK_TAGS = new Set([
  'ADDRESS', 'ARTICLE', 'ASIDE', 'BLOCKQUOTE', 'BR', 'DD', 'DIV', 'DL', 'DT',
  'FIELDSET', 'FIGCAPTION', 'FIGURE', 'FOOTER', 'FORM', 'H1', 'H2', 'H3', 'H4',
  'H5', 'H6', 'HEADER', 'HR', 'LI', 'MAIN', 'NAV', 'OL', 'OPTION', 'P', 'PRE',
  'SECTION', 'TABLE', 'TD', 'TH', 'TITLE', 'TR', 'UL',
]);

const BLOCK_END = Symbol('block-end');

function decodeBody(body: string | Uint8Array): string {
  const text = typeof body === 'string' ? body : new TextDecoder('utf-8').decode(body);
  if (text.length > MAX_HTML_LENGTH) {
    logger.debug({ size: text.length, limit: MAX_HTML_LENGTH }, 'Truncating oversized markup');
    return text.slice(0, MAX_HTML_LENGTH);
  }
  return text;
}

/** Fragments get a document shell so head/body lookups behave the same. */
function toDocumentMarkup(html: string): string {
  return /<html[\s>]/i.test(html)
    ? html
    : `<!DOCTYPE html><html><head></head><body>${html}</body></html>`;
}

/**
 * Visible text under `root`, with block boundaries turned into spaces.
 * Iterative so that deeply nested markup cannot exhaust the call stack.
 */
function visibleText(root: Node): string {
  const parts: string[] = [];
  const stack: Array<Node | typeof BLOCK_END> = [root];

  while (stack.length > 0) {
    const item = stack.pop();
    if (item === undefined) break;
    if (item === BLOCK_END) {
      parts.push(' ');
      continue;
    }
    if (item.nodeType === TEXT_NODE) {
      parts.push(item.nodeValue ?? '');
      continue;
    }
    if (item.nodeType !== ELEMENT_NODE) continue;

    if (BLOCK_TAGS.has(item.nodeName.toUpperCase())) {
      parts.push(' ');
      stack.push(BLOCK_END);
    }
    const children = Array.from(item.childNodes);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return collapseWhitespace(parts.join(''));
}

function extractFromDocument(document: Document, pageUrl: string): ExtractedPage {
  const metadata = extractMetaTags(document);
  const baseUrl = resolveBaseUrl(document, pageUrl);
  const linkDetails = extractLinkDetails(document, baseUrl, pageUrl);
  const links = linkDetails.map((link) => link.url);
  const imageDetails = extractImageDetails(document, baseUrl);
  const mailto = extractMailtoAddresses(document);
  const title = extractTitle(document);
  // Script-borne data has to be read before invisible elements go
  const structuredData = extractJsonLd(document);
  const scripts = extractScriptSources(document, baseUrl);
  const stylesheets = extractStylesheets(document, baseUrl);

  for (const el of document.querySelectorAll(INVISIBLE_SELECTORS)) {
    el.remove();
  }

  const root = document.body ?? document.documentElement;
  const fullText = root ? visibleText(root) : '';

  return {
    title,
    description: extractDescription(metadata),
    keywords: extractKeywords(metadata),
    lang: extractLang(document, metadata),
    text: truncate(fullText, MAX_TEXT_LENGTH),
    wordCount: countWords(fullText),
    headings: extractHeadings(document),
    links,
    images: imageDetails.map((image) => image.src),
    emails: extractEmails(fullText, mailto),
    phones: extractPhones(fullText),
    metadata,
    linkDetails,
    imageDetails,
    paragraphs: extractParagraphs(document),
    tables: extractTables(document),
    lists: extractLists(document),
    forms: extractForms(document, baseUrl),
    scripts,
    stylesheets,
    socialLinks: extractSocialLinks(links),
    structuredData,
  };
}

/**
 * Parse markup into page content. Relative URLs are resolved against
 * `baseUrl` (or the document's <base href>). Never throws.
 */
export function extract(body: string | Uint8Array, baseUrl: string): ExtractedPage {
  try {
    const html = decodeBody(body);
    if (!html.trim()) return emptyPage();

    const { document } = parseHTML(toDocumentMarkup(html));
    return extractFromDocument(document, baseUrl);
  } catch (e) {
    logger.debug({ baseUrl, error: String(e) }, 'Extraction failed, returning empty page');
    return emptyPage();
  }
}

export interface RecordStamp {
  url: string;
  status: number;
  fetchedAt: string;
  contentType?: string | null;
  /** Defaults to `url`. */
  finalUrl?: string;
}

/** Freeze a plain-data value and everything reachable from it. */
function deepFreeze<T extends object>(root: T): T {
  const seen = new Set<object>();
  const stack: object[] = [root];
  while (stack.length > 0) {
    const value = stack.pop();
    if (value === undefined || seen.has(value)) continue;
    seen.add(value);
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      if (typeof child === 'object' && child !== null) stack.push(child);
    }
  }
  return root;
}

/** Combine extracted content with fetch facts into a deeply frozen PageRecord. */
export function buildPageRecord(page: ExtractedPage, stamp: RecordStamp): PageRecord {
  return deepFreeze<PageRecord>({
    url: stamp.url,
    status: stamp.status,
    fetchedAt: stamp.fetchedAt,
    contentType: stamp.contentType ?? null,
    finalUrl: stamp.finalUrl ?? stamp.url,
    ...page,
  });
}
