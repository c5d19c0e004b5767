/**
 * Contact address extraction (e-mail addresses, phone numbers) from page text.
 */
import { uniqueInOrder } from './utils.js';

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const EMAIL_EXACT = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

// Optional country code, then a 3-3-4 North American style number
const PHONE_PATTERN =
  /(?<![\d+])(?:\+\d{1,3}[\s.-]?)?(?:\(\d{3}\)|\d{3})[\s.-]?\d{3}[\s.-]?\d{4}(?!\d)/g;

/**
 * E-mail addresses found in the text plus any extra candidates (mailto targets).
 * Lower-cased and de-duplicated in discovery order.
 */
export function extractEmails(text: string, extraCandidates: string[] = []): string[] {
  const found = text.match(EMAIL_PATTERN) ?? [];
  const extra = extraCandidates.filter((candidate) => EMAIL_EXACT.test(candidate));
  return uniqueInOrder([...found, ...extra].map((email) => email.toLowerCase()));
}

/** Phone numbers found in the text, de-duplicated in discovery order. */
export function extractPhones(text: string): string[] {
  return uniqueInOrder(text.match(PHONE_PATTERN) ?? []);
}
