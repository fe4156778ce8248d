import {
  listings,
  listing_snapshots,
  advertisers,
  run_logs,
  insertAdvertiserSchema,
  insertSnapshotSchema,
  type Listing,
  type ListingSnapshot,
  type Advertiser,
  type RunLog,
  type InsertListing,
  type InsertSnapshot,
  type InsertRunLog,
  type ListingFilters,
} from "@shared/schema";
import {
  DEFAULT_ADVERTISER_LIMIT,
  type AdvertiserCounterDrift,
  type AdvertiserSighting,
  type ListingSummary,
  type ListingTrends,
  type TopAdvertiserQuery,
} from "@shared/types/analytics";
import { db } from "./db";
import { eq, desc, asc, and, gte, lte, isNotNull, isNull, sql, type SQL } from "drizzle-orm";

export type RunLogUpdate = Partial<Omit<InsertRunLog, "id">>;

export interface IStorage {
  // Listing methods
  getListings(filters?: ListingFilters): Promise<Listing[]>;
  getListingById(id: string): Promise<Listing | undefined>;
  createListing(listing: InsertListing): Promise<Listing>;
  markListingSeen(id: string, seenDate: string): Promise<void>;
  countListingsByPhone(phone: string): Promise<number>;

  // Snapshot methods
  createSnapshot(snapshot: InsertSnapshot): Promise<ListingSnapshot>;
  getSnapshots(listingId: string): Promise<ListingSnapshot[]>;

  // Advertiser methods
  recordAdvertiserListing(sighting: AdvertiserSighting): Promise<Advertiser>;
  getAdvertiserByPhone(phone: string): Promise<Advertiser | undefined>;
  getTopAdvertisers(query?: TopAdvertiserQuery): Promise<Advertiser[]>;
  getAdvertiserCounterDrift(): Promise<AdvertiserCounterDrift[]>;

  // Analytics
  getSummary(): Promise<ListingSummary>;
  getTrends(): Promise<ListingTrends>;

  // Run log methods
  createRunLog(run: InsertRunLog): Promise<RunLog>;
  updateRunLog(id: number, update: RunLogUpdate): Promise<void>;
  getLatestRunLog(): Promise<RunLog | undefined>;

  /** Throws when the store is unreachable. */
  healthCheck(): Promise<void>;
}

export class DatabaseStorage implements IStorage {
  // Listing methods
  async getListings(filters: ListingFilters = {}): Promise<Listing[]> {
    const conditions: SQL[] = [];

    if (filters.property_type) {
      conditions.push(eq(listings.property_type, filters.property_type));
    }
    if (filters.transaction_type) {
      conditions.push(eq(listings.transaction_type, filters.transaction_type));
    }
    if (filters.is_owner !== undefined) {
      conditions.push(eq(listings.is_owner, filters.is_owner));
    }
    if (filters.is_agent !== undefined) {
      conditions.push(eq(listings.is_agent, filters.is_agent));
    }
    if (filters.min_price !== undefined) {
      conditions.push(gte(listings.price, filters.min_price));
    }
    if (filters.max_price !== undefined) {
      conditions.push(lte(listings.price, filters.max_price));
    }
    if (filters.has_coords === true) {
      conditions.push(isNotNull(listings.latitude), isNotNull(listings.longitude));
    } else if (filters.has_coords === false) {
      conditions.push(sql`(${listings.latitude} is null or ${listings.longitude} is null)`);
    }

    return await db
      .select()
      .from(listings)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(listings.last_seen_date), desc(listings.created_at));
  }

  async getListingById(id: string): Promise<Listing | undefined> {
    const [listing] = await db.select().from(listings).where(eq(listings.id, id));
    return listing || undefined;
  }

  async createListing(listing: InsertListing): Promise<Listing> {
    const [newListing] = await db
      .insert(listings)
      .values(listing)
      .returning();
    return newListing;
  }

  // last_seen_date never moves backwards
  async markListingSeen(id: string, seenDate: string): Promise<void> {
    await db
      .update(listings)
      .set({ last_seen_date: sql`greatest(${listings.last_seen_date}, ${seenDate}::date)` })
      .where(eq(listings.id, id));
  }

  async countListingsByPhone(phone: string): Promise<number> {
    const [result] = await db
      .select({ count: sql<number>`count(*)` })
      .from(listings)
      .where(eq(listings.contact_phone, phone));
    return Number(result.count);
  }

  // Snapshot methods
  async createSnapshot(snapshot: InsertSnapshot): Promise<ListingSnapshot> {
    const [newSnapshot] = await db
      .insert(listing_snapshots)
      .values(insertSnapshotSchema.parse(snapshot))
      .returning();
    return newSnapshot;
  }

  async getSnapshots(listingId: string): Promise<ListingSnapshot[]> {
    return await db
      .select()
      .from(listing_snapshots)
      .where(eq(listing_snapshots.listing_id, listingId))
      .orderBy(asc(listing_snapshots.seen_date), asc(listing_snapshots.id));
  }

  // Advertiser methods

  /**
   * Create the advertiser with one listing, or count one more listing for it.
   * A single statement, so concurrent sightings of one phone cannot lose an increment.
   */
  async recordAdvertiserListing(sighting: AdvertiserSighting): Promise<Advertiser> {
    const values = insertAdvertiserSchema.parse({
      phone: sighting.phone,
      name: sighting.name,
      is_owner: sighting.is_owner,
      is_agent: sighting.is_agent,
      agency_name: sighting.agency_name,
      total_listings: 1,
      first_seen: sighting.seen_date,
      last_seen: sighting.seen_date,
    });

    const [advertiser] = await db
      .insert(advertisers)
      .values(values)
      .onConflictDoUpdate({
        target: advertisers.phone,
        set: {
          total_listings: sql`${advertisers.total_listings} + 1`,
          last_seen: sql`greatest(${advertisers.last_seen}, excluded.last_seen)`,
          first_seen: sql`least(${advertisers.first_seen}, excluded.first_seen)`,
          name: sql`coalesce(${advertisers.name}, excluded.name)`,
          agency_name: sql`coalesce(${advertisers.agency_name}, excluded.agency_name)`,
          is_owner: sql`${advertisers.is_owner} or excluded.is_owner`,
          is_agent: sql`${advertisers.is_agent} or excluded.is_agent`,
        },
      })
      .returning();
    return advertiser;
  }

  async getAdvertiserByPhone(phone: string): Promise<Advertiser | undefined> {
    const [advertiser] = await db.select().from(advertisers).where(eq(advertisers.phone, phone));
    return advertiser || undefined;
  }

  async getTopAdvertisers(query: TopAdvertiserQuery = {}): Promise<Advertiser[]> {
    return await db
      .select()
      .from(advertisers)
      .where(query.is_owner !== undefined ? eq(advertisers.is_owner, query.is_owner) : undefined)
      .orderBy(desc(advertisers.total_listings), asc(advertisers.phone))
      .limit(query.limit ?? DEFAULT_ADVERTISER_LIMIT);
  }

  async getAdvertiserCounterDrift(): Promise<AdvertiserCounterDrift[]> {
    const counted = await db
      .select({
        phone: advertisers.phone,
        total_listings: advertisers.total_listings,
        actual_listings: sql<number>`(select count(*) from ${listings} where ${listings.contact_phone} = ${advertisers.phone})`,
      })
      .from(advertisers);

    // Phones on listings that never got an advertiser row
    const orphaned = await db
      .select({
        phone: listings.contact_phone,
        actual_listings: sql<number>`count(*)`,
      })
      .from(listings)
      .leftJoin(advertisers, eq(listings.contact_phone, advertisers.phone))
      .where(and(isNotNull(listings.contact_phone), isNull(advertisers.phone)))
      .groupBy(listings.contact_phone);

    const drift: AdvertiserCounterDrift[] = counted
      .map(row => ({ ...row, actual_listings: Number(row.actual_listings) }))
      .filter(row => row.actual_listings !== row.total_listings);

    for (const row of orphaned) {
      if (row.phone === null) continue;
      drift.push({ phone: row.phone, total_listings: 0, actual_listings: Number(row.actual_listings) });
    }

    return drift.sort((a, b) => a.phone.localeCompare(b.phone));
  }

  // Analytics
  async getSummary(): Promise<ListingSummary> {
    const [counts] = await db
      .select({
        total: sql<number>`count(*)`,
        withCoords: sql<number>`count(*) filter (where ${listings.latitude} is not null and ${listings.longitude} is not null)`,
        owners: sql<number>`count(*) filter (where ${listings.is_owner})`,
        agents: sql<number>`count(*) filter (where ${listings.is_agent})`,
      })
      .from(listings);

    const [advertiserCount] = await db
      .select({ count: sql<number>`count(*)` })
      .from(advertisers);

    return {
      total_listings: Number(counts.total),
      with_coordinates: Number(counts.withCoords),
      owner_listings: Number(counts.owners),
      agent_listings: Number(counts.agents),
      total_advertisers: Number(advertiserCount.count),
    };
  }

  async getTrends(): Promise<ListingTrends> {
    const [counts] = await db
      .select({
        total: sql<number>`count(*)`,
        owners: sql<number>`count(*) filter (where ${listings.is_owner})`,
        agents: sql<number>`count(*) filter (where ${listings.is_agent})`,
        unknown: sql<number>`count(*) filter (where not ${listings.is_owner} and not ${listings.is_agent})`,
        avgPsf: sql<number | null>`avg(${listings.price}::float / ${listings.gfa_sqft}) filter (where ${listings.price} is not null and ${listings.gfa_sqft} > 0)`,
      })
      .from(listings);

    const byType = await db
      .select({
        property_type: listings.property_type,
        count: sql<number>`count(*)`,
      })
      .from(listings)
      .where(isNotNull(listings.property_type))
      .groupBy(listings.property_type);

    const byDate = await db
      .select({
        date: listings.first_seen_date,
        count: sql<number>`count(*)`,
      })
      .from(listings)
      .groupBy(listings.first_seen_date)
      .orderBy(asc(listings.first_seen_date));

    const by_property_type: ListingTrends["by_property_type"] = {};
    for (const row of byType) {
      if (row.property_type) by_property_type[row.property_type] = Number(row.count);
    }

    return {
      total_listings: Number(counts.total),
      by_property_type,
      owner_vs_agent: {
        owner: Number(counts.owners),
        agent: Number(counts.agents),
        unknown: Number(counts.unknown),
      },
      average_psf: counts.avgPsf === null ? null : Math.round(Number(counts.avgPsf) * 100) / 100,
      listings_by_date: byDate.map(row => ({ date: row.date, count: Number(row.count) })),
    };
  }

  // Run log methods
  async createRunLog(run: InsertRunLog): Promise<RunLog> {
    const [newRun] = await db
      .insert(run_logs)
      .values(run)
      .returning();
    return newRun;
  }

  async updateRunLog(id: number, update: RunLogUpdate): Promise<void> {
    await db
      .update(run_logs)
      .set(update)
      .where(eq(run_logs.id, id));
  }

  async getLatestRunLog(): Promise<RunLog | undefined> {
    const [run] = await db
      .select()
      .from(run_logs)
      .orderBy(desc(run_logs.started_at), desc(run_logs.id))
      .limit(1);
    return run || undefined;
  }

  async healthCheck(): Promise<void> {
    await db.execute(sql`select 1`);
  }
}

export const storage = new DatabaseStorage();
