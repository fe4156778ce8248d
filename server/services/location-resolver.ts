/**
 * LOCATION RESOLVER
 *
 * Per candidate term, in order:
 * 1. Gazetteer substring match (no network)
 * 2. Persistent cache (coords or explicit not-found)
 * 3. Geocoding provider with the verbatim term
 * 4. On empty: one retry with generic suffixes stripped
 *
 * Found and not-found results are cached; provider errors are not.
 * The first term that resolves wins. Never throws.
 */

import type { GeocodeResult } from '@shared/types/pipeline';
import type { Gazetteer } from './gazetteer';
import { cacheKey, type GeocodeCache } from './geocode-cache';
import { KeyedLimiter } from './keyed-limiter';
import type { GeocodingProvider } from './onemap-geocoder';
import { collapseWhitespace } from './scraper-utils';

const GENERIC_SUFFIXES = /\b(?:industrial|park|centre|center|tower|building|complex|hub|bldg)\b/gi;

export function simplifyTerm(term: string): string {
  return collapseWhitespace(term.replace(GENERIC_SUFFIXES, ''));
}

export interface LocationResolverDeps {
  gazetteer: Gazetteer;
  cache: GeocodeCache;
  provider: GeocodingProvider;
}

export class LocationResolver {
  private locks = new KeyedLimiter();

  constructor(private deps: LocationResolverDeps) {}

  async resolve(terms: string[]): Promise<GeocodeResult> {
    for (const term of terms) {
      const coords = await this.resolveTerm(term);
      if (coords) return coords;
    }
    return null;
  }

  async resolveTerm(term: string): Promise<GeocodeResult> {
    const trimmed = collapseWhitespace(term);
    if (!trimmed) return null;

    const known = this.deps.gazetteer.lookup(trimmed);
    if (known) return known;

    const key = cacheKey(trimmed);
    return this.locks.run(key, () => this.resolveRemote(trimmed, key));
  }

  private async resolveRemote(term: string, key: string): Promise<GeocodeResult> {
    const cached = this.deps.cache.lookup(key);
    if (cached.hit) return cached.value;

    const first = await this.deps.provider.search(term);
    if (first.kind === 'error') {
      console.error(`[GEOCODER] ❌ Lookup failed for "${term}": ${first.reason}`);
      return null;
    }
    if (first.kind === 'found') {
      await this.deps.cache.store(key, first.coords);
      return first.coords;
    }

    const simplified = simplifyTerm(term);
    if (simplified && simplified !== term) {
      const retry = await this.deps.provider.search(simplified);
      if (retry.kind === 'error') {
        console.error(`[GEOCODER] ❌ Lookup failed for "${simplified}": ${retry.reason}`);
        return null;
      }
      if (retry.kind === 'found') {
        console.log(`[GEOCODER] "${term}" resolved as "${simplified}"`);
        await this.deps.cache.store(key, retry.coords);
        return retry.coords;
      }
    }

    await this.deps.cache.store(key, null);
    return null;
  }
}
