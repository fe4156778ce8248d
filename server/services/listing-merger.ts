/**
 * LISTING MERGER
 *
 * Folds extracted listings into the store:
 * - Unknown id → geocode, create the listing, count it for its advertiser
 * - Known id → bump last_seen_date, append a snapshot, log price changes
 *
 * Work on one listing id (and on one advertiser phone) is serialized;
 * different ids run in parallel up to the configured concurrency.
 * A failing item is logged and counted, the rest of the batch carries on.
 */

import pLimit from 'p-limit';
import type { Listing } from '@shared/schema';
import type { ExtractedFields, GeocodeResult, RawListingBlock } from '@shared/types/pipeline';
import { errorMessage, PersistenceError } from '../errors';
import type { IStorage } from '../storage';
import { KeyedLimiter } from './keyed-limiter';
import { buildCandidateTerms } from './location-hints';
import { detectPriceChange, logPriceChange } from './price-tracker';
import { minDate, parseIsoDate } from './scraper-utils';

export interface MergeItem {
  block: RawListingBlock;
  fields: ExtractedFields;
}

export interface MergeResult {
  created: number;
  resighted: number;
  failed: number;
}

export type MergeOutcome = 'created' | 'resighted' | 'failed';

export interface CoordinateResolver {
  resolve(terms: string[]): Promise<GeocodeResult>;
}

export interface ListingMergerDeps {
  storage: IStorage;
  resolver: CoordinateResolver;
  concurrency?: number;
}

export class ListingMerger {
  private listingLocks = new KeyedLimiter();
  private advertiserLocks = new KeyedLimiter();
  private concurrency: number;

  constructor(private deps: ListingMergerDeps) {
    this.concurrency = Math.max(1, deps.concurrency ?? 1);
  }

  async mergeAll(items: MergeItem[], runDate: string): Promise<MergeResult> {
    const limit = pLimit(this.concurrency);
    const outcomes = await Promise.all(items.map(item => limit(() => this.mergeItem(item, runDate))));

    const result: MergeResult = { created: 0, resighted: 0, failed: 0 };
    for (const outcome of outcomes) {
      result[outcome]++;
    }

    console.log(`[MERGE] ✅ ${result.created} new, ${result.resighted} re-sighted, ${result.failed} failed`);
    return result;
  }

  async mergeItem(item: MergeItem, runDate: string): Promise<MergeOutcome> {
    try {
      return await this.listingLocks.run(item.block.id, () => this.mergeLocked(item, runDate));
    } catch (error) {
      const failure = error instanceof PersistenceError
        ? error
        : new PersistenceError(item.block.id, errorMessage(error), { cause: error });
      console.error(`[MERGE] ❌ ${failure.message}`);
      return 'failed';
    }
  }

  private async mergeLocked(item: MergeItem, runDate: string): Promise<MergeOutcome> {
    const existing = await this.deps.storage.getListingById(item.block.id);
    if (existing) {
      await this.resight(existing, item, runDate);
      return 'resighted';
    }

    await this.create(item, runDate);
    return 'created';
  }

  private async create({ block, fields }: MergeItem, runDate: string): Promise<void> {
    const coords = await this.deps.resolver.resolve(buildCandidateTerms(fields, block.raw_text));
    const firstSeen = minDate(parseIsoDate(block.scrape_date) ?? runDate, runDate);

    await this.deps.storage.createListing({
      id: block.id,
      ...fields,
      latitude: coords?.latitude ?? null,
      longitude: coords?.longitude ?? null,
      raw_text: block.raw_text,
      category: block.category,
      first_seen_date: firstSeen,
      last_seen_date: runDate,
    });

    if (fields.contact_phone) {
      await this.countForAdvertiser(block.id, fields.contact_phone, fields, firstSeen);
    }
  }

  // The listing is already stored: an advertiser failure is logged, not rethrown
  private async countForAdvertiser(listingId: string, phone: string, fields: ExtractedFields, seenDate: string): Promise<void> {
    try {
      await this.advertiserLocks.run(phone, () =>
        this.deps.storage.recordAdvertiserListing({
          phone,
          name: fields.contact_name,
          is_owner: fields.is_owner,
          is_agent: fields.is_agent,
          agency_name: fields.agency_name,
          seen_date: seenDate,
        })
      );
    } catch (error) {
      console.error(`[MERGE] ⚠️ Advertiser ${phone} not updated for listing ${listingId}: ${errorMessage(error)}`);
    }
  }

  private async resight(existing: Listing, { block, fields }: MergeItem, runDate: string): Promise<void> {
    const previousPrice = await this.latestKnownPrice(existing);
    await this.deps.storage.markListingSeen(existing.id, runDate);
    await this.deps.storage.createSnapshot({
      listing_id: existing.id,
      seen_date: runDate,
      price: fields.price,
      raw_text: block.raw_text,
    });

    const change = detectPriceChange(previousPrice, fields.price);
    if (change) logPriceChange(existing.id, change);
  }

  // Last priced snapshot, else the price the listing was created with
  private async latestKnownPrice(existing: Listing): Promise<number | null> {
    const snapshots = await this.deps.storage.getSnapshots(existing.id);
    for (let i = snapshots.length - 1; i >= 0; i--) {
      const price = snapshots[i].price;
      if (price !== null) return price;
    }
    return existing.price;
  }
}
