/**
 * FIELD EXTRACTOR
 *
 * Turns a batch of listing blocks into structured fields.
 *
 * - One batched provider call per run (never per item)
 * - Provider items are matched back by their listing_index, not array position
 * - Any provider failure or untrustworthy answer → regex fallback for the WHOLE batch
 * - Output always has the input's length and order; never throws
 */

import { z } from 'zod';
import { PROPERTY_TYPES, TRANSACTION_TYPES, type PropertyType, type TransactionType } from '@shared/schema';
import { emptyExtractedFields, type ExtractedFields, type RawListingBlock } from '@shared/types/pipeline';
import { errorMessage } from '../errors';
import type { ExtractionProvider, ProviderResult } from './extraction-provider';
import { fallbackExtract } from './fallback-extractor';
import { cleanPhone } from './scraper-utils';

export type ExtractionStrategy = 'provider' | 'fallback';

export interface ExtractionOutcome {
  strategy: ExtractionStrategy;
  fields: ExtractedFields[];
  fallbackReason?: string;
}

type Alignment =
  | { ok: true; items: Record<string, unknown>[] }
  | { ok: false; reason: string };

const providerItemSchema = z
  .object({
    listing_index: z.union([
      z.number().int(),
      z.string().trim().regex(/^\d+$/).transform(Number),
    ]),
  })
  .passthrough();

export class FieldExtractor {
  constructor(private provider: ExtractionProvider | null) {}

  async extract(blocks: RawListingBlock[]): Promise<ExtractedFields[]> {
    const outcome = await this.extractWithStrategy(blocks);
    return outcome.fields;
  }

  async extractWithStrategy(blocks: RawListingBlock[]): Promise<ExtractionOutcome> {
    if (blocks.length === 0) {
      return { strategy: 'provider', fields: [] };
    }

    const result = await this.callProvider(blocks);
    if (result.kind === 'failure') {
      return this.fallback(blocks, result.reason);
    }

    const alignment = alignByIndex(result.data, blocks.length);
    if (!alignment.ok) {
      return this.fallback(blocks, alignment.reason);
    }

    console.log(`[EXTRACTOR] ✅ Provider extracted ${blocks.length} listings`);
    return {
      strategy: 'provider',
      fields: alignment.items.map(normalizeProviderItem),
    };
  }

  private async callProvider(blocks: RawListingBlock[]): Promise<ProviderResult> {
    if (!this.provider) {
      return { kind: 'failure', reason: 'no extraction provider configured' };
    }

    const items = blocks.map((block, index) => ({
      index,
      text: block.raw_text,
      category: block.category ?? '',
    }));

    try {
      return await this.provider.extractBatch(items);
    } catch (error) {
      return { kind: 'failure', reason: errorMessage(error) };
    }
  }

  private fallback(blocks: RawListingBlock[], reason: string): ExtractionOutcome {
    console.log(`[EXTRACTOR] ⚠️ Using regex fallback for ${blocks.length} listings: ${reason}`);
    return {
      strategy: 'fallback',
      fields: blocks.map(b => fallbackExtract(b.raw_text, b.category)),
      fallbackReason: reason,
    };
  }
}

// ============================================
// ALIGNMENT
// ============================================

/**
 * Place each provider item at the position named by its listing_index.
 * Every input position must be covered exactly once.
 */
export function alignByIndex(data: unknown[], expected: number): Alignment {
  const slots: Array<Record<string, unknown> | undefined> = new Array(expected);

  for (const raw of data) {
    const parsed = providerItemSchema.safeParse(raw);
    if (!parsed.success) {
      return { ok: false, reason: 'item without a usable listing_index' };
    }
    const index = parsed.data.listing_index;
    if (index < 0 || index >= expected) {
      return { ok: false, reason: `listing_index ${index} out of range` };
    }
    if (slots[index] !== undefined) {
      return { ok: false, reason: `duplicate listing_index ${index}` };
    }
    slots[index] = parsed.data;
  }

  const items: Record<string, unknown>[] = [];
  for (let i = 0; i < expected; i++) {
    const item = slots[i];
    if (item === undefined) {
      return { ok: false, reason: `no item for listing_index ${i}` };
    }
    items.push(item);
  }
  return { ok: true, items };
}

// ============================================
// NORMALIZATION
// ============================================

function asString(value: unknown): string | null {
  if (typeof value === 'number' && isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 && trimmed.toLowerCase() !== 'null' ? trimmed : null;
}

const NUMERIC = /^-?\d+(\.\d+)?$/;

function asInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string') {
    const cleaned = value.replace(/[$,\s]/g, '');
    return NUMERIC.test(cleaned) ? Math.trunc(Number(cleaned)) : null;
  }
  return null;
}

function asBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return ['true', 'yes', 'y', '1'].includes(value.trim().toLowerCase());
  return false;
}

function asOptionalBoolean(value: unknown): boolean | null {
  return value === null || value === undefined ? null : asBoolean(value);
}

function asPhone(value: unknown): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  return cleanPhone(String(value));
}

function asPropertyType(value: unknown): PropertyType | null {
  const s = asString(value);
  if (!s) return null;
  return PROPERTY_TYPES.find(t => t.toLowerCase() === s.toLowerCase()) ?? 'Other';
}

function asTransactionType(value: unknown): TransactionType | null {
  const s = asString(value);
  if (!s) return null;
  return TRANSACTION_TYPES.find(t => t.toLowerCase() === s.toLowerCase()) ?? null;
}

function asFeatures(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .map(asString)
    .filter((f): f is string => f !== null);
}

export function normalizeProviderItem(item: Record<string, unknown>): ExtractedFields {
  return {
    ...emptyExtractedFields(),
    property_name: asString(item.property_name),
    address: asString(item.address),
    property_type: asPropertyType(item.property_type),
    property_subtype: asString(item.property_subtype),
    transaction_type: asTransactionType(item.transaction_type),
    price: asInteger(item.price),
    price_type: asString(item.price_type),
    gfa_sqft: asInteger(item.gfa_sqft),
    lease_type: asString(item.lease_type),
    lease_balance_years: asInteger(item.lease_balance_years),
    floor_level: asString(item.floor_level),
    features: asFeatures(item.features),
    contact_name: asString(item.contact_name),
    contact_phone: asPhone(item.contact_phone),
    is_owner: asBoolean(item.is_owner),
    is_agent: asBoolean(item.is_agent),
    agency_name: asString(item.agency_name),
    cobroke_allowed: asOptionalBoolean(item.cobroke_allowed),
  };
}
