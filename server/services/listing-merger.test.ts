import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Advertiser } from '@shared/schema';
import { emptyExtractedFields, type ExtractedFields, type GeocodeResult } from '@shared/types/pipeline';
import type { AdvertiserSighting } from '@shared/types/analytics';
import { MemStorage } from '../mem-storage';
import { contentHashIdentity } from './listing-identity';
import { ListingMerger, type CoordinateResolver, type MergeItem } from './listing-merger';

const NORTHSTAR = { latitude: 1.3786, longitude: 103.8621 };

class FakeResolver implements CoordinateResolver {
  calls: string[][] = [];

  constructor(private result: GeocodeResult = NORTHSTAR) {}

  async resolve(terms: string[]): Promise<GeocodeResult> {
    this.calls.push(terms);
    return this.result;
  }
}

function item(rawText: string, scrapeDate: string, fields: Partial<ExtractedFields> = {}): MergeItem {
  return {
    block: {
      id: contentHashIdentity.blockId(rawText, scrapeDate),
      raw_text: rawText,
      category: null,
      scrape_date: scrapeDate,
    },
    fields: { ...emptyExtractedFields(), ...fields },
  };
}

const FACTORY = 'B1 Factory unit, 1927 sqft @ Northstar AMK. For sale $1.2M. WhatsApp 90995525 Alan';
const OFFICE = 'Office for rent opp Aljunied MRT, 1200sf, $4K. Call 90995525 Alan';

describe('ListingMerger', () => {
  let storage: MemStorage;
  let resolver: FakeResolver;
  let merger: ListingMerger;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    storage = new MemStorage();
    resolver = new FakeResolver();
    merger = new ListingMerger({ storage, resolver, concurrency: 4 });
    return () => vi.restoreAllMocks();
  });

  it('creates unknown listings with coordinates and counts the advertiser', async () => {
    const factory = item(FACTORY, '2025-03-09', {
      property_name: 'Northstar AMK',
      price: 1_200_000,
      contact_phone: '90995525',
      contact_name: 'Alan',
      is_owner: true,
    });

    const result = await merger.mergeAll([factory], '2025-03-10');

    expect(result).toEqual({ created: 1, resighted: 0, failed: 0 });
    const listing = await storage.getListingById(factory.block.id);
    expect(listing).toMatchObject({
      property_name: 'Northstar AMK',
      price: 1_200_000,
      latitude: 1.3786,
      longitude: 103.8621,
      raw_text: FACTORY,
      first_seen_date: '2025-03-09',
      last_seen_date: '2025-03-10',
    });
    expect(resolver.calls[0][0]).toBe('Northstar AMK');

    const advertiser: Advertiser | undefined = await storage.getAdvertiserByPhone('90995525');
    expect(advertiser).toEqual({
      phone: '90995525',
      name: 'Alan',
      is_owner: true,
      is_agent: false,
      agency_name: null,
      total_listings: 1,
      first_seen: '2025-03-09',
      last_seen: '2025-03-09',
    });
  });

  it('stores null coordinates when nothing resolves', async () => {
    const unresolved = new ListingMerger({ storage, resolver: new FakeResolver(null) });
    const factory = item(FACTORY, '2025-03-09');

    await unresolved.mergeAll([factory], '2025-03-10');

    const listing = await storage.getListingById(factory.block.id);
    expect(listing?.latitude).toBeNull();
    expect(listing?.longitude).toBeNull();
  });

  it('keeps the advertiser counter equal to the number of listings', async () => {
    await merger.mergeAll([
      item(FACTORY, '2025-03-09', { contact_phone: '90995525' }),
      item(OFFICE, '2025-03-09', { contact_phone: '90995525', is_agent: true, agency_name: 'ERA' }),
    ], '2025-03-10');

    const advertiser = await storage.getAdvertiserByPhone('90995525');
    expect(advertiser?.total_listings).toBe(2);
    expect(advertiser?.is_agent).toBe(true);
    expect(advertiser?.agency_name).toBe('ERA');
    expect(await storage.countListingsByPhone('90995525')).toBe(2);
    expect(await storage.getAdvertiserCounterDrift()).toEqual([]);
  });

  it('appends exactly one snapshot when a listing is seen again', async () => {
    const first = item(FACTORY, '2025-03-09', { price: 1_200_000, contact_phone: '90995525' });
    await merger.mergeAll([first], '2025-03-10');

    const again = item(FACTORY, '2025-03-09', { price: 1_100_000, contact_phone: '90995525' });
    const result = await merger.mergeAll([again], '2025-03-11');

    expect(result).toEqual({ created: 0, resighted: 1, failed: 0 });
    expect(await storage.getSnapshots(first.block.id)).toEqual([
      { id: 1, listing_id: first.block.id, seen_date: '2025-03-11', price: 1_100_000, raw_text: FACTORY },
    ]);
    const listing = await storage.getListingById(first.block.id);
    expect(listing?.last_seen_date).toBe('2025-03-11');
    expect(listing?.price).toBe(1_200_000);
    expect((await storage.getAdvertiserByPhone('90995525'))?.total_listings).toBe(1);
  });

  it('compares a new price against the latest snapshot, not the first listing price', async () => {
    await merger.mergeAll([item(FACTORY, '2025-03-09', { price: 1_200_000 })], '2025-03-10');
    await merger.mergeAll([item(FACTORY, '2025-03-09', { price: 1_000_000 })], '2025-03-11');

    const log = vi.mocked(console.log);
    log.mockClear();
    await merger.mergeAll([item(FACTORY, '2025-03-09', { price: 1_000_000 })], '2025-03-12');

    expect(log.mock.calls.some(([line]) => String(line).startsWith('[PRICE-TRACKER]'))).toBe(false);
  });

  it('logs a price drop measured from the previous sighting', async () => {
    await merger.mergeAll([item(FACTORY, '2025-03-09', { price: 1_200_000 })], '2025-03-10');
    await merger.mergeAll([item(FACTORY, '2025-03-09', { price: 1_000_000 })], '2025-03-11');

    const log = vi.mocked(console.log);
    log.mockClear();
    await merger.mergeAll([item(FACTORY, '2025-03-09', { price: 750_000 })], '2025-03-12');

    const id = contentHashIdentity.blockId(FACTORY, '2025-03-09');
    const lines = log.mock.calls.map(([line]) => String(line)).filter(line => line.startsWith('[PRICE-TRACKER]'));
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain(`Listing ${id}`);
    expect(lines[0]).toContain('(-25.0%)');
  });

  it('never moves last_seen_date backwards', async () => {
    const factory = item(FACTORY, '2025-03-09');
    await merger.mergeAll([factory], '2025-03-12');
    await merger.mergeAll([factory], '2025-03-10');

    expect((await storage.getListingById(factory.block.id))?.last_seen_date).toBe('2025-03-12');
  });

  it('clamps first_seen_date to the run date', async () => {
    const future = item(FACTORY, '2025-03-20');
    await merger.mergeAll([future], '2025-03-10');

    const listing = await storage.getListingById(future.block.id);
    expect(listing?.first_seen_date).toBe('2025-03-10');
    expect(listing?.last_seen_date).toBe('2025-03-10');
  });

  it('creates a listing once when its id appears twice in a batch', async () => {
    const factory = item(FACTORY, '2025-03-09', { contact_phone: '90995525' });

    const result = await merger.mergeAll([factory, factory], '2025-03-10');

    expect(result).toEqual({ created: 1, resighted: 1, failed: 0 });
    expect(await storage.getSnapshots(factory.block.id)).toHaveLength(1);
    expect((await storage.getAdvertiserByPhone('90995525'))?.total_listings).toBe(1);
  });

  it('counts a failing listing and carries on with the batch', async () => {
    class FailingStorage extends MemStorage {
      async createListing(...args: Parameters<MemStorage['createListing']>) {
        if (args[0].raw_text === OFFICE) throw new Error('connection reset');
        return super.createListing(...args);
      }
    }
    const failing = new FailingStorage();
    const batch = [item(FACTORY, '2025-03-09'), item(OFFICE, '2025-03-09')];

    const result = await new ListingMerger({ storage: failing, resolver }).mergeAll(batch, '2025-03-10');

    expect(result).toEqual({ created: 1, resighted: 0, failed: 1 });
    expect(await failing.getListingById(batch[0].block.id)).toBeDefined();
    expect(await failing.getListingById(batch[1].block.id)).toBeUndefined();
  });

  it('keeps the listing when the advertiser update fails', async () => {
    class NoAdvertisers extends MemStorage {
      async recordAdvertiserListing(_sighting: AdvertiserSighting): Promise<Advertiser> {
        throw new Error('deadlock detected');
      }
    }
    const store = new NoAdvertisers();
    const factory = item(FACTORY, '2025-03-09', { contact_phone: '90995525' });

    const result = await new ListingMerger({ storage: store, resolver }).mergeAll([factory], '2025-03-10');

    expect(result).toEqual({ created: 1, resighted: 0, failed: 0 });
    expect(await store.getListingById(factory.block.id)).toBeDefined();
    expect(await store.getAdvertiserCounterDrift()).toEqual([
      { phone: '90995525', total_listings: 0, actual_listings: 1 },
    ]);
  });

  it('skips the advertiser when there is no phone', async () => {
    await merger.mergeAll([item(FACTORY, '2025-03-09')], '2025-03-10');
    expect((await storage.getSummary()).total_advertisers).toBe(0);
  });
});
