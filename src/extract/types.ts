/**
 * Shared types and constants for the extract module
 */

export const MAX_TEXT_LENGTH = 5000;
export const MAX_HTML_LENGTH = 10 * 1024 * 1024; // characters of decoded markup

/** Anchor text is cut to this many characters in link details. */
export const MAX_ANCHOR_TEXT_LENGTH = 100;

/** Paragraphs of this many characters or fewer are dropped. */
export const MIN_PARAGRAPH_LENGTH = 10;

export interface Headings {
  h1: string[];
  h2: string[];
  h3: string[];
}

export interface LinkDetail {
  url: string;
  text: string;
  /** Same host as the page URL. */
  internal: boolean;
}

export interface ImageDetail {
  src: string;
  alt: string | null;
  title: string | null;
}

/** Item texts per list, outer arrays in document order. */
export interface PageLists {
  ordered: string[][];
  unordered: string[][];
}

export interface FormField {
  /** input type (default "text"), or "textarea" / "select". */
  type: string;
  name: string | null;
  placeholder: string | null;
  label: string | null;
}

export interface FormDetail {
  action: string | null;
  /** Upper-cased, GET when absent. */
  method: string;
  inputs: FormField[];
}

export const SOCIAL_PLATFORMS = [
  'facebook',
  'twitter',
  'linkedin',
  'instagram',
  'youtube',
  'pinterest',
] as const;

export type SocialPlatform = (typeof SOCIAL_PLATFORMS)[number];

export type SocialLinks = Record<SocialPlatform, string[]>;

/**
 * Everything extract() derives from markup alone.
 * Deterministic: the same body and base URL always give the same value.
 */
export interface ExtractedPage {
  title: string | null;
  description: string | null;
  keywords: string | null;
  lang: string | null;
  /** Visible text, whitespace-collapsed, truncated to MAX_TEXT_LENGTH. */
  text: string;
  /** Word count of the untruncated text. */
  wordCount: number;
  headings: Headings;
  /** Absolute http(s) URLs, fragment-free, unique, in discovery order. */
  links: string[];
  /** Absolute image URLs in document order. */
  images: string[];
  /** Lower-cased addresses, unique, in discovery order. */
  emails: string[];
  phones: string[];
  /** meta[name|property] → content, in document order. */
  metadata: Record<string, string>;
  /** One entry per URL in `links`, same order, text of the first anchor. */
  linkDetails: LinkDetail[];
  /** One entry per URL in `images`, same order. */
  imageDetails: ImageDetail[];
  paragraphs: string[];
  /** Tables → rows → cell texts. */
  tables: string[][][];
  lists: PageLists;
  forms: FormDetail[];
  /** External script URLs, unique, in document order. */
  scripts: string[];
  /** Stylesheet URLs, unique, in document order. */
  stylesheets: string[];
  /** Links to known social platforms, per platform. */
  socialLinks: SocialLinks;
  /** Parsed JSON-LD blocks in document order; malformed blocks are skipped. */
  structuredData: unknown[];
}

export interface PageRecord extends ExtractedPage {
  /** The URL that was requested. */
  url: string;
  /** HTTP status of the response the record was built from. */
  status: number;
  /** ISO-8601 timestamp of the fetch. */
  fetchedAt: string;
  /** Content-Type response header, when sent. */
  contentType: string | null;
  /** URL of the response after redirects; `url` when the transport does not report one. */
  finalUrl: string;
}

export function emptySocialLinks(): SocialLinks {
  return {
    facebook: [],
    twitter: [],
    linkedin: [],
    instagram: [],
    youtube: [],
    pinterest: [],
  };
}

export function emptyPage(): ExtractedPage {
  return {
    title: null,
    description: null,
    keywords: null,
    lang: null,
    text: '',
    wordCount: 0,
    headings: { h1: [], h2: [], h3: [] },
    links: [],
    images: [],
    emails: [],
    phones: [],
    metadata: {},
    linkDetails: [],
    imageDetails: [],
    paragraphs: [],
    tables: [],
    lists: { ordered: [], unordered: [] },
    forms: [],
    scripts: [],
    stylesheets: [],
    socialLinks: emptySocialLinks(),
    structuredData: [],
  };
}
