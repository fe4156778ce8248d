/**
 * Listing Segmenter
 * Cuts one date's page text into candidate listing blocks
 *
 * Primary pass: the page prints a category header before every ad, followed by
 * "<Subcategory> Space - <seq>" and the ad body. Fallback pass (used when the
 * primary pass finds fewer than 2 ads): a text window around every 8-digit run.
 *
 * Both passes are pure functions of (text, date).
 */

import { load } from 'cheerio';
import type { RawListingBlock } from '@shared/types/pipeline';
import { contentHashIdentity, type IdentityStrategy } from './listing-identity';
import { collapseWhitespace, containsLocalPhone, EIGHT_DIGIT_PATTERN } from './scraper-utils';

export const MIN_BLOCK_LENGTH = 30;
export const MAX_BLOCK_LENGTH = 500;

const CATEGORY_SPLIT = /(Commercial[/\s]*Industrial\s*Properties)/i;
const SUBCATEGORY_BODY = /([A-Za-z/\s]+Space\s*-\s*\d+)\s*([\s\S]+?)(?=Commercial[/\s]*Industrial|$)/i;
const CATEGORY_LABEL = 'Commercial/Industrial Properties';

const FALLBACK_WINDOW_BEFORE = 50;
const FALLBACK_WINDOW_AFTER = 100;
const FALLBACK_KEYWORDS = ['sqft', 'sf', 'rent', 'sale', 'factory', 'warehouse', 'office', 'shop'];

const BLOCK_ELEMENTS = 'p, div, li, tr, td, h1, h2, h3, h4, h5, h6, article, section, a';

// ============================================
// MARKUP → TEXT
// ============================================

/**
 * Flatten page markup into newline-separated text, preferring the list container.
 */
export function pageToText(html: string): string {
  const $ = load(html);
  $('script, style, noscript').remove();

  const listView = $('div.listView').first();
  const scope = listView.length > 0 ? listView : $('body');

  scope.find('br').replaceWith('\n');
  scope.find(BLOCK_ELEMENTS).each((_, el) => {
    $(el).append('\n');
  });

  return scope.text();
}

// ============================================
// SEGMENTATION
// ============================================

export function segmentListings(
  text: string,
  scrapeDate: string,
  identity: IdentityStrategy = contentHashIdentity
): RawListingBlock[] {
  const blocks = segmentByCategory(text, scrapeDate, identity);

  if (blocks.length < 2) {
    const seen = new Set(blocks.map(b => b.id));
    for (const block of segmentByPhoneWindows(text, scrapeDate, identity)) {
      if (seen.has(block.id)) continue;
      seen.add(block.id);
      blocks.push(block);
    }
  }

  return blocks;
}

export function segmentByCategory(
  text: string,
  scrapeDate: string,
  identity: IdentityStrategy = contentHashIdentity
): RawListingBlock[] {
  const parts = text.split(CATEGORY_SPLIT);
  const blocks: RawListingBlock[] = [];

  // split() keeps the captured header, so bodies sit at even indices after 0
  for (let i = 1; i + 1 < parts.length; i += 2) {
    const match = parts[i + 1].match(SUBCATEGORY_BODY);
    if (!match) continue;

    const subcategory = collapseWhitespace(match[1]);
    const block = createBlock(match[2], `${CATEGORY_LABEL} - ${subcategory}`, scrapeDate, identity);
    if (block) blocks.push(block);
  }

  return blocks;
}

export function segmentByPhoneWindows(
  text: string,
  scrapeDate: string,
  identity: IdentityStrategy = contentHashIdentity
): RawListingBlock[] {
  const blocks: RawListingBlock[] = [];
  const seen = new Set<string>();

  for (const match of text.matchAll(EIGHT_DIGIT_PATTERN)) {
    const start = match.index ?? 0;
    const before = text.slice(Math.max(0, start - FALLBACK_WINDOW_BEFORE), start);
    const after = text.slice(start + match[0].length, start + match[0].length + FALLBACK_WINDOW_AFTER);
    const candidate = collapseWhitespace(`${before} ${match[0]} ${after}`);

    const lower = candidate.toLowerCase();
    if (!FALLBACK_KEYWORDS.some(k => lower.includes(k))) continue;

    const block = createBlock(candidate, null, scrapeDate, identity);
    if (!block || seen.has(block.id)) continue;
    seen.add(block.id);
    blocks.push(block);
  }

  return blocks;
}

/**
 * Normalize, truncate and validate a candidate body. Null when it is too short
 * or carries no local phone number.
 */
export function createBlock(
  body: string,
  category: string | null,
  scrapeDate: string,
  identity: IdentityStrategy = contentHashIdentity
): RawListingBlock | null {
  const rawText = collapseWhitespace(body).slice(0, MAX_BLOCK_LENGTH).trimEnd();
  if (rawText.length < MIN_BLOCK_LENGTH) return null;
  if (!containsLocalPhone(rawText)) return null;

  return {
    id: identity.blockId(rawText, scrapeDate),
    raw_text: rawText,
    category,
    scrape_date: scrapeDate,
  };
}
