import type { PropertyType, TransactionType } from "../schema";

/**
 * One candidate ad cut out of a date's page text.
 * `id` is content-addressed; see server/services/listing-identity.ts.
 */
export interface RawListingBlock {
  readonly id: string;
  readonly raw_text: string;
  readonly category: string | null;
  readonly scrape_date: string; // YYYY-MM-DD
}

/**
 * Structured attributes pulled out of one block. Every field is optional
 * in the domain sense: null means "not stated in the ad".
 */
export interface ExtractedFields {
  property_name: string | null;
  address: string | null;
  property_type: PropertyType | null;
  property_subtype: string | null;
  transaction_type: TransactionType | null;
  price: number | null;
  price_type: string | null;
  gfa_sqft: number | null;
  lease_type: string | null;
  lease_balance_years: number | null;
  floor_level: string | null;
  features: string[];
  contact_name: string | null;
  contact_phone: string | null;
  is_owner: boolean;
  is_agent: boolean;
  agency_name: string | null;
  cobroke_allowed: boolean | null;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/** Both coordinates or none. */
export type GeocodeResult = Coordinates | null;

export function emptyExtractedFields(): ExtractedFields {
  return {
    property_name: null,
    address: null,
    property_type: null,
    property_subtype: null,
    transaction_type: null,
    price: null,
    price_type: null,
    gfa_sqft: null,
    lease_type: null,
    lease_balance_years: null,
    floor_level: null,
    features: [],
    contact_name: null,
    contact_phone: null,
    is_owner: false,
    is_agent: false,
    agency_name: null,
    cobroke_allowed: null,
  };
}
