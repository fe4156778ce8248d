import { describe, expect, it } from 'vitest';
import { insertAdvertiserSchema, insertSnapshotSchema, listingFiltersSchema } from './schema';

describe('listingFiltersSchema', () => {
  it('parses query-string values', () => {
    expect(listingFiltersSchema.parse({ is_owner: 'true', has_coords: 'false', min_price: '1000' })).toEqual({
      is_owner: true,
      has_coords: false,
      min_price: 1000,
    });
  });

  it('rejects unknown property types', () => {
    expect(listingFiltersSchema.safeParse({ property_type: 'Condo' }).success).toBe(false);
  });
});

describe('insert schemas', () => {
  it('require the fields the tables need', () => {
    expect(insertSnapshotSchema.safeParse({ listing_id: 'abc', seen_date: '2025-03-09' }).success).toBe(true);
    expect(insertSnapshotSchema.safeParse({ seen_date: '2025-03-09' }).success).toBe(false);
    expect(insertAdvertiserSchema.safeParse({ phone: '91234567' }).success).toBe(false);
  });
});
