/**
 * Deterministic field extraction from ad text.
 *
 * Used for the whole batch when the generative provider is unavailable or its
 * answer cannot be trusted. Lower fidelity than the provider: it only knows
 * the handful of patterns below.
 */

import type { PropertyType, TransactionType } from '@shared/schema';
import { emptyExtractedFields, type ExtractedFields } from '@shared/types/pipeline';
import { LOCAL_PHONE_PATTERN } from './scraper-utils';

const AMOUNT = String.raw`\$?(\d[\d,]*(?:\.\d+)?)`;
const PRICE_MILLIONS = new RegExp(`${AMOUNT}\\s*m(?:il(?:lion)?)?(?![a-z])`, 'i');
const PRICE_THOUSANDS = new RegExp(`${AMOUNT}\\s*[Kk](?![A-Za-z])`);
const FLOOR_AREA = /(\d[\d,]*)\s*(?:sqft|sq\s*ft|sf)\b/i;

const OWNER_PATTERN = /\bowner\b|\bdirect\b/i;
const AGENCIES: Array<[RegExp, string]> = [
  [/\bpropnex\b/i, 'PropNex'],
  [/\bera\b/i, 'ERA'],
  [/\borangetee\b/i, 'OrangeTee'],
  [/\bhuttons\b/i, 'Huttons'],
  [/\bdennis\s+wee\b/i, 'Dennis Wee'],
];

const LEADING_NAME = /^([A-Z][A-Za-z]+(?:\s+[A-Z][A-Za-z]+){0,3})/;
const ADDRESS_PATTERNS = [
  /\b(?:at|near|opp|opposite)\s+([A-Za-z\s]+(?:MRT|Road|Ave|Street|Park|Hub|Centre|Center))/i,
  /@\s*([A-Za-z\s]+(?:MRT|Road|Ave|Street|Park|Hub|Centre|Center))/i,
  /\b(Tuas|Ubi|Tai Seng|Mandai|Woodlands|Jurong|Changi|Paya Lebar|Geylang|Aljunied|Kallang)\b/i,
];

const FREEHOLD = /\bfreehold\b/i;
const LEASE_YEARS = /\b(999|99|60|30)\s*-?\s*(?:yrs?|years?)\b/i;
const CONTACT_NAME_AFTER_PHONE = /^[\s:,-]*([A-Z][a-z]+(?:\s+[A-Z][a-z]+){0,2})\b/;

// ============================================
// NUMBERS
// ============================================

function parseAmount(raw: string): number | null {
  const value = parseFloat(raw.replace(/,/g, ''));
  return isNaN(value) ? null : value;
}

export function extractPrice(text: string): number | null {
  const millions = text.match(PRICE_MILLIONS);
  if (millions) {
    const amount = parseAmount(millions[1]);
    if (amount !== null) return Math.round(amount * 1_000_000);
  }

  const thousands = text.match(PRICE_THOUSANDS);
  if (thousands) {
    const amount = parseAmount(thousands[1]);
    if (amount !== null) return Math.round(amount * 1_000);
  }

  return null;
}

export function extractFloorArea(text: string): number | null {
  const m = text.match(FLOOR_AREA);
  if (!m) return null;
  const amount = parseAmount(m[1]);
  return amount === null ? null : Math.trunc(amount);
}

// ============================================
// CONTACT
// ============================================

export function extractPhone(text: string): string | null {
  return text.match(LOCAL_PHONE_PATTERN)?.[0] ?? null;
}

function extractContactName(text: string): string | null {
  const phone = text.match(LOCAL_PHONE_PATTERN);
  if (!phone || phone.index === undefined) return null;
  const rest = text.slice(phone.index + phone[0].length);
  return rest.match(CONTACT_NAME_AFTER_PHONE)?.[1] ?? null;
}

function detectAgency(text: string): string | null {
  for (const [pattern, name] of AGENCIES) {
    if (pattern.test(text)) return name;
  }
  return null;
}

// ============================================
// PROPERTY
// ============================================

function extractAddress(text: string): string | null {
  for (const pattern of ADDRESS_PATTERNS) {
    const m = text.match(pattern);
    if (m) return m[1].trim();
  }
  return null;
}

export function propertyTypeFromCategory(category: string | null | undefined): PropertyType {
  const c = (category || '').toLowerCase();
  if (c.includes('factory') || c.includes('warehouse')) return 'Factory/Warehouse';
  if (c.includes('office')) return 'Office';
  if (c.includes('shop')) return 'Shop';
  return 'Other';
}

function detectTransactionType(text: string): TransactionType | null {
  const sale = /\bsale\b/i.test(text);
  const rent = /\brent\b/i.test(text);
  if (sale && rent) return 'Both';
  if (sale) return 'Sale';
  if (rent) return 'Rent';
  return null;
}

function detectLeaseType(text: string): string | null {
  if (FREEHOLD.test(text)) return 'Freehold';
  const m = text.match(LEASE_YEARS);
  return m ? `${m[1]}yr` : null;
}

export function fallbackExtract(text: string, category: string | null = null): ExtractedFields {
  const agency = detectAgency(text);

  return {
    ...emptyExtractedFields(),
    property_name: text.match(LEADING_NAME)?.[1] ?? null,
    address: extractAddress(text),
    property_type: propertyTypeFromCategory(category),
    transaction_type: detectTransactionType(text),
    price: extractPrice(text),
    gfa_sqft: extractFloorArea(text),
    lease_type: detectLeaseType(text),
    contact_name: extractContactName(text),
    contact_phone: extractPhone(text),
    is_owner: OWNER_PATTERN.test(text),
    is_agent: agency !== null,
    agency_name: agency,
  };
}
