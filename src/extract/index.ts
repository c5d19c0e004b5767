/**
 * Extract module barrel exports
 */
export { extract, buildPageRecord } from './page-extractor.js';
export type { RecordStamp } from './page-extractor.js';
export {
  extractLinkDetails,
  extractLinks,
  extractMailtoAddresses,
  extractSocialLinks,
  resolveBaseUrl,
} from './link-extractor.js';
export { extractImageDetails, extractImages, parseSrcsetLargest } from './media-extractor.js';
export { extractJsonLd } from './json-ld-extractor.js';
export {
  extractForms,
  extractLists,
  extractParagraphs,
  extractScriptSources,
  extractStylesheets,
  extractTables,
} from './structure-extractors.js';
export { extractEmails, extractPhones } from './contacts.js';
export { countWords } from './utils.js';
export type {
  ExtractedPage,
  FormDetail,
  FormField,
  Headings,
  ImageDetail,
  LinkDetail,
  PageLists,
  PageRecord,
  SocialLinks,
  SocialPlatform,
} from './types.js';
export { MAX_TEXT_LENGTH, SOCIAL_PLATFORMS, emptyPage, emptySocialLinks } from './types.js';
