/**
 * Location hint mining
 *
 * Proposes candidate terms for geocoding from a block's raw text, ranked by
 * the pattern that found them. Extracted fields (property_name, address) are
 * preferred over anything mined here.
 */

import type { ExtractedFields } from '@shared/types/pipeline';
import { collapseWhitespace } from './scraper-utils';

export const MAX_HINTS = 5;
export const MIN_TERM_LENGTH = 3;

// Up to four words after a marker, stopping at punctuation
const PHRASE = String.raw`([A-Za-z][A-Za-z0-9'&-]*(?:[ \t]+[A-Za-z][A-Za-z0-9'&-]*){0,3})`;

const LEADING_PHRASE = /^([A-Z][A-Za-z]+(?:\s+[A-Z][A-Za-z]+){0,3})/;
const AT_SIGN = new RegExp(String.raw`@\s*${PHRASE}`, 'g');
const NEAR = new RegExp(String.raw`\b(?:near|opp|opposite|beside)\.?\s+${PHRASE}`, 'gi');
const INDUSTRIAL_PARK = /\b([A-Za-z][A-Za-z0-9]*(?:\s+[A-Za-z][A-Za-z0-9]*){0,2}\s+(?:Tech\s*Park|Techpark|Techplace|(?:Tech|Industrial|Biz|Business|Logistics|Food|Media|Auto)\s+(?:Park|Hub|Centre|Center|Link|Building|Hive)))\b/gi;

const NAMED_AREAS = [
  'Tuas', 'Ubi', 'Tai Seng', 'Mandai', 'Woodlands', 'Jurong', 'Changi', 'Paya Lebar',
  'Geylang', 'Aljunied', 'Kallang', 'Kaki Bukit', 'Eunos', 'Loyang', 'Kranji',
  'Sungei Kadut', 'Pioneer', 'Henderson', 'Macpherson', 'Bendemeer', 'Ang Mo Kio', 'AMK',
  'Toa Payoh', 'Serangoon', 'Yishun', 'Sembawang', 'Admiralty', 'Bukit Batok',
];
const NAMED_AREA = new RegExp(`\\b(${NAMED_AREAS.map(a => a.replace(/ /g, '\\s+')).join('|')})\\b`, 'gi');

const ABBREVIATIONS: Array<[RegExp, string]> = [
  [/\bAMK\b/gi, 'Ang Mo Kio'],
];

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'at', 'the', 'to', 'or', 'for', 'with', 'in', 'of', 'let',
  'sale', 'rent', 'lease', 'call', 'tel', 'sms', 'whatsapp', 'wa', 'contact', 'pls',
  'unit', 'units', 'new', 'price', 'owner', 'direct', 'agent', 'urgent', 'cheap',
  'nice', 'good', 'big', 'high', 'low', 'ground', 'floor', 'flr', 'sty',
  'sqft', 'sf', 'freehold', 'leasehold', 'factory', 'warehouse', 'office', 'shop',
  'space', 'b1', 'b2', 'near', 'opp', 'opposite', 'beside',
]);

function isStopWord(word: string): boolean {
  return STOP_WORDS.has(word.toLowerCase());
}

/**
 * Strip stop words from both ends, expand known abbreviations.
 * Null when nothing meaningful is left.
 */
export function cleanHint(raw: string): string | null {
  const words = collapseWhitespace(raw).replace(/[.,;:!]+$/, '').split(' ').filter(Boolean);

  while (words.length > 0 && isStopWord(words[0])) words.shift();
  while (words.length > 0 && isStopWord(words[words.length - 1])) words.pop();

  let hint = words.join(' ');
  for (const [pattern, replacement] of ABBREVIATIONS) {
    hint = hint.replace(pattern, replacement);
  }

  return hint.length > 2 ? hint : null;
}

function matchesOf(text: string, pattern: RegExp): string[] {
  return Array.from(text.matchAll(pattern), m => m[1]);
}

export function extractLocationHints(text: string): string[] {
  const leading = text.match(LEADING_PHRASE)?.[1];

  const candidates = [
    ...(leading ? [leading] : []),
    ...matchesOf(text, AT_SIGN),
    ...matchesOf(text, NEAR),
    ...matchesOf(text, NAMED_AREA),
    ...matchesOf(text, INDUSTRIAL_PARK),
  ];

  return dedupeTerms(candidates.map(cleanHint)).slice(0, MAX_HINTS);
}

/**
 * Ordered candidate terms for one listing: property_name, address, then mined hints.
 */
export function buildCandidateTerms(fields: Pick<ExtractedFields, 'property_name' | 'address'>, rawText: string): string[] {
  const terms = [fields.property_name, fields.address, ...extractLocationHints(rawText)]
    .map(t => (t ? collapseWhitespace(t) : null))
    .map(t => (t && t.length >= MIN_TERM_LENGTH ? t : null));

  return dedupeTerms(terms);
}

// Case-insensitive, first spelling wins
function dedupeTerms(terms: Array<string | null>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const term of terms) {
    if (!term) continue;
    const key = term.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(term);
  }
  return result;
}
