import { pgTable, text, serial, integer, boolean, timestamp, date, doublePrecision, json, index } from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Listing ids are content hashes (see server/services/listing-identity.ts), not serials
export const listings = pgTable("listings", {
  id: text("id").primaryKey(),
  property_name: text("property_name"),
  address: text("address"),
  latitude: doublePrecision("latitude"),
  longitude: doublePrecision("longitude"),
  property_type: text("property_type").$type<PropertyType>(),
  property_subtype: text("property_subtype"), // B1, B2, ...
  transaction_type: text("transaction_type").$type<TransactionType>(),
  price: integer("price"),
  price_type: text("price_type"), // total, per_sqft, per_month
  gfa_sqft: integer("gfa_sqft"),
  lease_type: text("lease_type"), // Freehold, 999yr, 99yr, 60yr, 30yr
  lease_balance_years: integer("lease_balance_years"),
  floor_level: text("floor_level"),
  features: json("features").$type<string[]>().default([]).notNull(),
  contact_name: text("contact_name"),
  contact_phone: text("contact_phone"),
  is_owner: boolean("is_owner").default(false).notNull(),
  is_agent: boolean("is_agent").default(false).notNull(),
  agency_name: text("agency_name"),
  cobroke_allowed: boolean("cobroke_allowed"),
  raw_text: text("raw_text").notNull(),
  category: text("category"),
  first_seen_date: date("first_seen_date", { mode: "string" }).notNull(),
  last_seen_date: date("last_seen_date", { mode: "string" }).notNull(),
  created_at: timestamp("created_at").defaultNow().notNull(),
}, (table) => ({
  phoneIdx: index("listings_contact_phone_idx").on(table.contact_phone),
  typeIdx: index("listings_property_type_idx").on(table.property_type),
}));

export const listing_snapshots = pgTable("listing_snapshots", {
  id: serial("id").primaryKey(),
  listing_id: text("listing_id").notNull().references(() => listings.id, { onDelete: "cascade" }),
  seen_date: date("seen_date", { mode: "string" }).notNull(),
  price: integer("price"),
  raw_text: text("raw_text"),
}, (table) => ({
  listingIdx: index("listing_snapshots_listing_id_idx").on(table.listing_id),
}));

export const advertisers = pgTable("advertisers", {
  phone: text("phone").primaryKey(),
  name: text("name"),
  is_owner: boolean("is_owner").default(false).notNull(),
  is_agent: boolean("is_agent").default(false).notNull(),
  agency_name: text("agency_name"),
  total_listings: integer("total_listings").default(0).notNull(),
  first_seen: date("first_seen", { mode: "string" }).notNull(),
  last_seen: date("last_seen", { mode: "string" }).notNull(),
});

export const run_logs = pgTable("run_logs", {
  id: serial("id").primaryKey(),
  started_at: timestamp("started_at").defaultNow().notNull(),
  finished_at: timestamp("finished_at"),
  days_back: integer("days_back").notNull(),
  status: text("status").$type<RunStatus>().notNull(),
  listings_found: integer("listings_found").default(0).notNull(),
  listings_new: integer("listings_new").default(0).notNull(),
  listings_updated: integer("listings_updated").default(0).notNull(),
  error_message: text("error_message"),
});

export const listingsRelations = relations(listings, ({ many }) => ({
  snapshots: many(listing_snapshots),
}));

export const listingSnapshotsRelations = relations(listing_snapshots, ({ one }) => ({
  listing: one(listings, {
    fields: [listing_snapshots.listing_id],
    references: [listings.id],
  }),
}));

export const PROPERTY_TYPES = ["Factory/Warehouse", "Office", "Shop", "Mixed", "Other"] as const;
export type PropertyType = typeof PROPERTY_TYPES[number];

export const TRANSACTION_TYPES = ["Sale", "Rent", "Both"] as const;
export type TransactionType = typeof TRANSACTION_TYPES[number];

export const RUN_STATUSES = ["running", "completed", "failed"] as const;
export type RunStatus = typeof RUN_STATUSES[number];

export const insertSnapshotSchema = createInsertSchema(listing_snapshots).omit({
  id: true,
});

export const insertAdvertiserSchema = createInsertSchema(advertisers);

export type InsertListing = typeof listings.$inferInsert;
export type Listing = typeof listings.$inferSelect;
export type InsertSnapshot = typeof listing_snapshots.$inferInsert;
export type ListingSnapshot = typeof listing_snapshots.$inferSelect;
export type InsertAdvertiser = typeof advertisers.$inferInsert;
export type Advertiser = typeof advertisers.$inferSelect;
export type InsertRunLog = typeof run_logs.$inferInsert;
export type RunLog = typeof run_logs.$inferSelect;

// Query surface used by the API layer
export const listingFiltersSchema = z.object({
  property_type: z.enum(PROPERTY_TYPES).optional(),
  transaction_type: z.enum(TRANSACTION_TYPES).optional(),
  is_owner: z.enum(["true", "false"]).transform((v) => v === "true").optional(),
  is_agent: z.enum(["true", "false"]).transform((v) => v === "true").optional(),
  min_price: z.coerce.number().int().nonnegative().optional(),
  max_price: z.coerce.number().int().nonnegative().optional(),
  has_coords: z.enum(["true", "false"]).transform((v) => v === "true").optional(),
});

export type ListingFilters = z.infer<typeof listingFiltersSchema>;
