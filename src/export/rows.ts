/**
 * Flattening bundle entries into rows with a fixed key set, shared by every
 * output format.
 */
import {
  emptySocialLinks,
  SOCIAL_PLATFORMS,
  type FormDetail,
  type Headings,
  type ImageDetail,
  type LinkDetail,
  type PageLists,
  type SocialLinks,
} from '../extract/types.js';
import type { FetchFailureKind } from '../fetch/types.js';
import type { BundleEntry, ExportBundle } from './types.js';

/** Separator for list values in single-cell formats (CSV, Excel). */
export const LIST_SEPARATOR = ' | ';

export interface ExportRowError {
  kind: FetchFailureKind;
  message: string;
  statusCode: number | null;
  attempts: number;
}

export interface ExportRow {
  key: string;
  outcome: 'success' | 'error';
  url: string;
  status: number | null;
  fetchedAt: string | null;
  title: string | null;
  description: string | null;
  keywords: string | null;
  lang: string | null;
  text: string;
  wordCount: number;
  headings: Headings;
  links: string[];
  images: string[];
  emails: string[];
  phones: string[];
  metadata: Record<string, string>;
  contentType: string | null;
  finalUrl: string | null;
  linkDetails: LinkDetail[];
  imageDetails: ImageDetail[];
  paragraphs: string[];
  tables: string[][][];
  lists: PageLists;
  forms: FormDetail[];
  scripts: string[];
  stylesheets: string[];
  socialLinks: SocialLinks;
  structuredData: unknown[];
  error: ExportRowError | null;
}

export function toRow(key: string, entry: BundleEntry): ExportRow {
  if (entry.type === 'record') {
    const { record } = entry;
    return {
      key,
      outcome: 'success',
      url: record.url,
      status: record.status,
      fetchedAt: record.fetchedAt,
      title: record.title,
      description: record.description,
      keywords: record.keywords,
      lang: record.lang,
      text: record.text,
      wordCount: record.wordCount,
      headings: record.headings,
      links: record.links,
      images: record.images,
      emails: record.emails,
      phones: record.phones,
      metadata: record.metadata,
      contentType: record.contentType,
      finalUrl: record.finalUrl,
      linkDetails: record.linkDetails,
      imageDetails: record.imageDetails,
      paragraphs: record.paragraphs,
      tables: record.tables,
      lists: record.lists,
      forms: record.forms,
      scripts: record.scripts,
      stylesheets: record.stylesheets,
      socialLinks: record.socialLinks,
      structuredData: record.structuredData,
      error: null,
    };
  }

  const { error } = entry;
  return {
    key,
    outcome: 'error',
    url: entry.url,
    status: error.statusCode ?? null,
    fetchedAt: null,
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
    contentType: null,
    finalUrl: null,
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
    error: {
      kind: error.kind,
      message: error.message,
      statusCode: error.statusCode ?? null,
      attempts: error.attempts,
    },
  };
}

/** One row per bundle entry, in bundle order. */
export function toRows(bundle: ExportBundle): ExportRow[] {
  return [...bundle.entries].map(([key, entry]) => toRow(key, entry));
}

type Cell = string | number;

interface TableColumn {
  header: string;
  value: (row: ExportRow) => Cell;
}

const list = (values: string[]): string => values.join(LIST_SEPARATOR);

/** JSON for structured values; empty collections give an empty cell. */
function jsonList(values: readonly unknown[]): string {
  return values.length > 0 ? JSON.stringify(values) : '';
}

function jsonObject(value: object): string {
  return Object.keys(value).length > 0 ? JSON.stringify(value) : '';
}

function nonEmptyPlatforms(links: SocialLinks): Partial<SocialLinks> {
  const present: Partial<SocialLinks> = {};
  for (const platform of SOCIAL_PLATFORMS) {
    if (links[platform].length > 0) present[platform] = links[platform];
  }
  return present;
}

function listsCell(lists: PageLists): string {
  return lists.ordered.length > 0 || lists.unordered.length > 0 ? JSON.stringify(lists) : '';
}

/** Column layout for tabular formats. */
export const TABLE_COLUMNS: readonly TableColumn[] = [
  { header: 'key', value: (r) => r.key },
  { header: 'outcome', value: (r) => r.outcome },
  { header: 'url', value: (r) => r.url },
  { header: 'status', value: (r) => r.status ?? '' },
  { header: 'fetched_at', value: (r) => r.fetchedAt ?? '' },
  { header: 'title', value: (r) => r.title ?? '' },
  { header: 'description', value: (r) => r.description ?? '' },
  { header: 'keywords', value: (r) => r.keywords ?? '' },
  { header: 'lang', value: (r) => r.lang ?? '' },
  { header: 'word_count', value: (r) => r.wordCount },
  { header: 'text', value: (r) => r.text },
  { header: 'h1', value: (r) => list(r.headings.h1) },
  { header: 'h2', value: (r) => list(r.headings.h2) },
  { header: 'h3', value: (r) => list(r.headings.h3) },
  { header: 'links', value: (r) => list(r.links) },
  { header: 'images', value: (r) => list(r.images) },
  { header: 'emails', value: (r) => list(r.emails) },
  { header: 'phones', value: (r) => list(r.phones) },
  { header: 'metadata', value: (r) => jsonObject(r.metadata) },
  { header: 'content_type', value: (r) => r.contentType ?? '' },
  { header: 'final_url', value: (r) => r.finalUrl ?? '' },
  { header: 'paragraphs', value: (r) => list(r.paragraphs) },
  { header: 'link_details', value: (r) => jsonList(r.linkDetails) },
  { header: 'image_details', value: (r) => jsonList(r.imageDetails) },
  { header: 'tables', value: (r) => jsonList(r.tables) },
  { header: 'lists', value: (r) => listsCell(r.lists) },
  { header: 'forms', value: (r) => jsonList(r.forms) },
  { header: 'scripts', value: (r) => list(r.scripts) },
  { header: 'stylesheets', value: (r) => list(r.stylesheets) },
  { header: 'social_links', value: (r) => jsonObject(nonEmptyPlatforms(r.socialLinks)) },
  { header: 'structured_data', value: (r) => jsonList(r.structuredData) },
  { header: 'error_kind', value: (r) => r.error?.kind ?? '' },
  { header: 'error_message', value: (r) => r.error?.message ?? '' },
];

export const TABLE_HEADERS: readonly string[] = TABLE_COLUMNS.map((column) => column.header);

export function toCells(row: ExportRow): Cell[] {
  return TABLE_COLUMNS.map((column) => column.value(row));
}
