import type { Listing, ListingSnapshot, PropertyType } from "../schema";

export interface ListingWithSnapshots extends Listing {
  snapshots: ListingSnapshot[];
}

/** One sighting of a phone number on a newly created listing. */
export interface AdvertiserSighting {
  phone: string;
  name: string | null;
  is_owner: boolean;
  is_agent: boolean;
  agency_name: string | null;
  seen_date: string; // YYYY-MM-DD
}

export const DEFAULT_ADVERTISER_LIMIT = 20;

export interface TopAdvertiserQuery {
  limit?: number;
  is_owner?: boolean;
}

export interface ListingSummary {
  total_listings: number;
  with_coordinates: number;
  owner_listings: number;
  agent_listings: number;
  total_advertisers: number;
}

export interface ListingTrends {
  total_listings: number;
  by_property_type: Partial<Record<PropertyType, number>>;
  owner_vs_agent: {
    owner: number;
    agent: number;
    unknown: number;
  };
  average_psf: number | null;
  listings_by_date: Array<{ date: string; count: number }>;
}

/** An advertiser whose stored counter disagrees with the listings table. */
export interface AdvertiserCounterDrift {
  phone: string;
  total_listings: number;
  actual_listings: number;
}
