import type {
  Advertiser,
  InsertListing,
  InsertRunLog,
  InsertSnapshot,
  Listing,
  ListingFilters,
  ListingSnapshot,
  PropertyType,
  RunLog,
} from "@shared/schema";
import {
  DEFAULT_ADVERTISER_LIMIT,
  type AdvertiserCounterDrift,
  type AdvertiserSighting,
  type ListingSummary,
  type ListingTrends,
  type TopAdvertiserQuery,
} from "@shared/types/analytics";
import type { IStorage, RunLogUpdate } from "./storage";
import { maxDate, minDate } from "./services/scraper-utils";

/**
 * In-process store with the same semantics as DatabaseStorage.
 * Backs the tests.
 */
export class MemStorage implements IStorage {
  private listings = new Map<string, Listing>();
  private snapshots: ListingSnapshot[] = [];
  private advertisers = new Map<string, Advertiser>();
  private runLogs: RunLog[] = [];
  private nextSnapshotId = 1;
  private nextRunLogId = 1;

  /** When set, every call rejects with this error. */
  outage: Error | null = null;

  private check(): void {
    if (this.outage) throw this.outage;
  }

  // Listing methods
  async getListings(filters: ListingFilters = {}): Promise<Listing[]> {
    this.check();
    return Array.from(this.listings.values())
      .filter(l => filters.property_type === undefined || l.property_type === filters.property_type)
      .filter(l => filters.transaction_type === undefined || l.transaction_type === filters.transaction_type)
      .filter(l => filters.is_owner === undefined || l.is_owner === filters.is_owner)
      .filter(l => filters.is_agent === undefined || l.is_agent === filters.is_agent)
      .filter(l => filters.min_price === undefined || (l.price !== null && l.price >= filters.min_price))
      .filter(l => filters.max_price === undefined || (l.price !== null && l.price <= filters.max_price))
      .filter(l => {
        if (filters.has_coords === undefined) return true;
        const hasCoords = l.latitude !== null && l.longitude !== null;
        return hasCoords === filters.has_coords;
      })
      .sort((a, b) =>
        b.last_seen_date.localeCompare(a.last_seen_date) ||
        b.created_at.getTime() - a.created_at.getTime()
      )
      .map(l => ({ ...l }));
  }

  async getListingById(id: string): Promise<Listing | undefined> {
    this.check();
    const listing = this.listings.get(id);
    return listing ? { ...listing } : undefined;
  }

  async createListing(listing: InsertListing): Promise<Listing> {
    this.check();
    if (this.listings.has(listing.id)) {
      throw new Error(`duplicate key value violates unique constraint "listings_pkey" (${listing.id})`);
    }

    const row: Listing = {
      id: listing.id,
      property_name: listing.property_name ?? null,
      address: listing.address ?? null,
      latitude: listing.latitude ?? null,
      longitude: listing.longitude ?? null,
      property_type: listing.property_type ?? null,
      property_subtype: listing.property_subtype ?? null,
      transaction_type: listing.transaction_type ?? null,
      price: listing.price ?? null,
      price_type: listing.price_type ?? null,
      gfa_sqft: listing.gfa_sqft ?? null,
      lease_type: listing.lease_type ?? null,
      lease_balance_years: listing.lease_balance_years ?? null,
      floor_level: listing.floor_level ?? null,
      features: listing.features ?? [],
      contact_name: listing.contact_name ?? null,
      contact_phone: listing.contact_phone ?? null,
      is_owner: listing.is_owner ?? false,
      is_agent: listing.is_agent ?? false,
      agency_name: listing.agency_name ?? null,
      cobroke_allowed: listing.cobroke_allowed ?? null,
      raw_text: listing.raw_text,
      category: listing.category ?? null,
      first_seen_date: listing.first_seen_date,
      last_seen_date: listing.last_seen_date,
      created_at: listing.created_at ?? new Date(),
    };
    this.listings.set(row.id, row);
    return { ...row };
  }

  async markListingSeen(id: string, seenDate: string): Promise<void> {
    this.check();
    const listing = this.listings.get(id);
    if (listing) {
      listing.last_seen_date = maxDate(listing.last_seen_date, seenDate);
    }
  }

  async countListingsByPhone(phone: string): Promise<number> {
    this.check();
    return Array.from(this.listings.values()).filter(l => l.contact_phone === phone).length;
  }

  // Snapshot methods
  async createSnapshot(snapshot: InsertSnapshot): Promise<ListingSnapshot> {
    this.check();
    if (!this.listings.has(snapshot.listing_id)) {
      throw new Error(`insert violates foreign key constraint on listing_snapshots (${snapshot.listing_id})`);
    }

    const row: ListingSnapshot = {
      id: this.nextSnapshotId++,
      listing_id: snapshot.listing_id,
      seen_date: snapshot.seen_date,
      price: snapshot.price ?? null,
      raw_text: snapshot.raw_text ?? null,
    };
    this.snapshots.push(row);
    return { ...row };
  }

  async getSnapshots(listingId: string): Promise<ListingSnapshot[]> {
    this.check();
    return this.snapshots
      .filter(s => s.listing_id === listingId)
      .sort((a, b) => a.seen_date.localeCompare(b.seen_date) || a.id - b.id)
      .map(s => ({ ...s }));
  }

  // Advertiser methods
  async recordAdvertiserListing(sighting: AdvertiserSighting): Promise<Advertiser> {
    this.check();
    const existing = this.advertisers.get(sighting.phone);

    const advertiser: Advertiser = existing
      ? {
          ...existing,
          total_listings: existing.total_listings + 1,
          last_seen: maxDate(existing.last_seen, sighting.seen_date),
          first_seen: minDate(existing.first_seen, sighting.seen_date),
          name: existing.name ?? sighting.name,
          agency_name: existing.agency_name ?? sighting.agency_name,
          is_owner: existing.is_owner || sighting.is_owner,
          is_agent: existing.is_agent || sighting.is_agent,
        }
      : {
          phone: sighting.phone,
          name: sighting.name,
          is_owner: sighting.is_owner,
          is_agent: sighting.is_agent,
          agency_name: sighting.agency_name,
          total_listings: 1,
          first_seen: sighting.seen_date,
          last_seen: sighting.seen_date,
        };

    this.advertisers.set(advertiser.phone, advertiser);
    return { ...advertiser };
  }

  async getAdvertiserByPhone(phone: string): Promise<Advertiser | undefined> {
    this.check();
    const advertiser = this.advertisers.get(phone);
    return advertiser ? { ...advertiser } : undefined;
  }

  async getTopAdvertisers(query: TopAdvertiserQuery = {}): Promise<Advertiser[]> {
    this.check();
    return Array.from(this.advertisers.values())
      .filter(a => query.is_owner === undefined || a.is_owner === query.is_owner)
      .sort((a, b) => b.total_listings - a.total_listings || a.phone.localeCompare(b.phone))
      .slice(0, query.limit ?? DEFAULT_ADVERTISER_LIMIT)
      .map(a => ({ ...a }));
  }

  async getAdvertiserCounterDrift(): Promise<AdvertiserCounterDrift[]> {
    this.check();
    const actual = new Map<string, number>();
    for (const listing of this.listings.values()) {
      if (listing.contact_phone) {
        actual.set(listing.contact_phone, (actual.get(listing.contact_phone) ?? 0) + 1);
      }
    }

    const drift: AdvertiserCounterDrift[] = [];
    for (const advertiser of this.advertisers.values()) {
      const count = actual.get(advertiser.phone) ?? 0;
      if (count !== advertiser.total_listings) {
        drift.push({ phone: advertiser.phone, total_listings: advertiser.total_listings, actual_listings: count });
      }
    }
    for (const [phone, count] of actual) {
      if (!this.advertisers.has(phone)) {
        drift.push({ phone, total_listings: 0, actual_listings: count });
      }
    }

    return drift.sort((a, b) => a.phone.localeCompare(b.phone));
  }

  // Analytics
  async getSummary(): Promise<ListingSummary> {
    this.check();
    const all = Array.from(this.listings.values());
    return {
      total_listings: all.length,
      with_coordinates: all.filter(l => l.latitude !== null && l.longitude !== null).length,
      owner_listings: all.filter(l => l.is_owner).length,
      agent_listings: all.filter(l => l.is_agent).length,
      total_advertisers: this.advertisers.size,
    };
  }

  async getTrends(): Promise<ListingTrends> {
    this.check();
    const all = Array.from(this.listings.values());

    const by_property_type: Partial<Record<PropertyType, number>> = {};
    for (const listing of all) {
      if (listing.property_type) {
        by_property_type[listing.property_type] = (by_property_type[listing.property_type] ?? 0) + 1;
      }
    }

    const psf: number[] = [];
    for (const listing of all) {
      if (listing.price !== null && listing.gfa_sqft !== null && listing.gfa_sqft > 0) {
        psf.push(listing.price / listing.gfa_sqft);
      }
    }

    const byDate = new Map<string, number>();
    for (const listing of all) {
      byDate.set(listing.first_seen_date, (byDate.get(listing.first_seen_date) ?? 0) + 1);
    }

    return {
      total_listings: all.length,
      by_property_type,
      owner_vs_agent: {
        owner: all.filter(l => l.is_owner).length,
        agent: all.filter(l => l.is_agent).length,
        unknown: all.filter(l => !l.is_owner && !l.is_agent).length,
      },
      average_psf: psf.length > 0
        ? Math.round((psf.reduce((sum, v) => sum + v, 0) / psf.length) * 100) / 100
        : null,
      listings_by_date: Array.from(byDate.entries())
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([date, count]) => ({ date, count })),
    };
  }

  // Run log methods
  async createRunLog(run: InsertRunLog): Promise<RunLog> {
    this.check();
    const row: RunLog = {
      id: this.nextRunLogId++,
      started_at: run.started_at ?? new Date(),
      finished_at: run.finished_at ?? null,
      days_back: run.days_back,
      status: run.status,
      listings_found: run.listings_found ?? 0,
      listings_new: run.listings_new ?? 0,
      listings_updated: run.listings_updated ?? 0,
      error_message: run.error_message ?? null,
    };
    this.runLogs.push(row);
    return { ...row };
  }

  async updateRunLog(id: number, update: RunLogUpdate): Promise<void> {
    this.check();
    const run = this.runLogs.find(r => r.id === id);
    if (!run) return;
    const defined = Object.entries(update).filter(([, value]) => value !== undefined);
    Object.assign(run, Object.fromEntries(defined));
  }

  async getLatestRunLog(): Promise<RunLog | undefined> {
    this.check();
    const latest = this.runLogs[this.runLogs.length - 1];
    return latest ? { ...latest } : undefined;
  }

  async healthCheck(): Promise<void> {
    this.check();
  }
}
