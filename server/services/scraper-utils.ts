/**
 * Shared Scraper Utilities
 * Common helpers used across the ingestion pipeline
 */

// ============================================
// DELAY
// ============================================

export function sleep(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}

// ============================================
// TEXT NORMALIZATION
// ============================================

export function collapseWhitespace(s: string): string {
  return s.split(/\s+/).filter(Boolean).join(' ');
}

// ============================================
// PHONE EXTRACTION & VALIDATION
// ============================================

// Local numbers: 8 digits, leading 6 (fixed line), 8 or 9 (mobile)
export const LOCAL_PHONE_PATTERN = /(?<!\d)[689]\d{7}(?!\d)/;
export const EIGHT_DIGIT_PATTERN = /(?<!\d)\d{8}(?!\d)/g;

export function normalizePhone(s: string): string {
  return s.replace(/\D/g, '');
}

export function isValidLocalPhone(digits: string): boolean {
  return /^[689]\d{7}$/.test(digits);
}

/**
 * Normalize a raw phone value and accept it only if it is a valid local number.
 */
export function cleanPhone(value: string): string | null {
  let digits = normalizePhone(value);
  if (digits.length === 10 && digits.startsWith('65')) {
    digits = digits.slice(2); // +65 country code
  }
  return isValidLocalPhone(digits) ? digits : null;
}

export function containsLocalPhone(text: string): boolean {
  return LOCAL_PHONE_PATTERN.test(text);
}

// ============================================
// DATES (YYYY-MM-DD strings, UTC calendar)
// ============================================

export function toIsoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Today's calendar date in the server's local time zone. */
export function todayIsoDate(now: Date = new Date()): string {
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${now.getFullYear()}-${month}-${day}`;
}

export function parseIsoDate(s: string | null | undefined): string | null {
  if (!s || !/^\d{4}-\d{2}-\d{2}$/.test(s)) return null;
  const d = new Date(`${s}T00:00:00Z`);
  if (isNaN(d.getTime()) || toIsoDate(d) !== s) return null;
  return s;
}

export function shiftDays(isoDate: string, days: number): string {
  const d = new Date(`${isoDate}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return toIsoDate(d);
}

export function minDate(a: string, b: string): string {
  return a <= b ? a : b;
}

export function maxDate(a: string, b: string): string {
  return a >= b ? a : b;
}
