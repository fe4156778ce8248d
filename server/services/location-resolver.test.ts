import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Coordinates } from '@shared/types/pipeline';
import { Gazetteer } from './gazetteer';
import { GeocodeCache, MemoryCacheBackend } from './geocode-cache';
import { LocationResolver, simplifyTerm } from './location-resolver';
import type { GeocodeSearchResult, GeocodingProvider } from './onemap-geocoder';
import { sleep } from './scraper-utils';

const TUAS: Coordinates = { latitude: 1.32, longitude: 103.64 };
const NORTHSTAR: Coordinates = { latitude: 1.3786, longitude: 103.8621 };

class FakeGeocoder implements GeocodingProvider {
  calls: string[] = [];

  constructor(private answers: Record<string, GeocodeSearchResult>) {}

  async search(term: string): Promise<GeocodeSearchResult> {
    this.calls.push(term);
    await sleep(5);
    return this.answers[term] ?? { kind: 'empty' };
  }
}

function setup(answers: Record<string, GeocodeSearchResult>) {
  const backend = new MemoryCacheBackend();
  const cache = new GeocodeCache(backend);
  const provider = new FakeGeocoder(answers);
  const resolver = new LocationResolver({
    gazetteer: new Gazetteer([{ name: 'tuas', ...TUAS }]),
    cache,
    provider,
  });
  return { backend, cache, provider, resolver };
}

describe('simplifyTerm', () => {
  it('removes generic building suffixes', () => {
    expect(simplifyTerm('Northstar Industrial Building')).toBe('Northstar');
    expect(simplifyTerm('Sim Lim Tower')).toBe('Sim Lim');
    expect(simplifyTerm('Parkway Parade')).toBe('Parkway Parade');
  });
});

describe('LocationResolver', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    return () => vi.restoreAllMocks();
  });

  it('answers from the gazetteer without a remote lookup', async () => {
    const { provider, resolver } = setup({});

    expect(await resolver.resolveTerm('Tuas Ave 1')).toEqual(TUAS);
    expect(provider.calls).toEqual([]);
  });

  it('caches a found result under the lower-cased term', async () => {
    const { backend, provider, resolver } = setup({ 'Northstar': { kind: 'found', coords: NORTHSTAR } });

    expect(await resolver.resolveTerm('Northstar')).toEqual(NORTHSTAR);
    expect(await resolver.resolveTerm('  northstar ')).toEqual(NORTHSTAR);

    expect(provider.calls).toEqual(['Northstar']);
    expect(backend.document).toEqual({ northstar: [1.3786, 103.8621] });
  });

  it('retries once with the simplified term and caches under the original', async () => {
    const { backend, provider, resolver } = setup({ 'Northstar': { kind: 'found', coords: NORTHSTAR } });

    expect(await resolver.resolveTerm('Northstar Industrial Building')).toEqual(NORTHSTAR);

    expect(provider.calls).toEqual(['Northstar Industrial Building', 'Northstar']);
    expect(backend.document).toEqual({ 'northstar industrial building': [1.3786, 103.8621] });
  });

  it('caches not-found results', async () => {
    const { backend, provider, resolver } = setup({});

    expect(await resolver.resolveTerm('Nowhere Hub')).toBeNull();
    expect(await resolver.resolveTerm('Nowhere Hub')).toBeNull();

    expect(provider.calls).toEqual(['Nowhere Hub', 'Nowhere']);
    expect(backend.document).toEqual({ 'nowhere hub': null });
  });

  it('does not cache provider errors', async () => {
    const { backend, provider, resolver } = setup({ 'Northstar': { kind: 'error', reason: 'timeout' } });

    expect(await resolver.resolveTerm('Northstar')).toBeNull();
    expect(await resolver.resolveTerm('Northstar')).toBeNull();

    expect(provider.calls).toEqual(['Northstar', 'Northstar']);
    expect(backend.saves).toBe(0);
  });

  it('returns the first term that resolves', async () => {
    const { provider, resolver } = setup({ 'Northstar': { kind: 'found', coords: NORTHSTAR } });

    expect(await resolver.resolve(['Unknown Place', 'Northstar', 'Tuas'])).toEqual(NORTHSTAR);
    expect(provider.calls).toEqual(['Unknown Place', 'Northstar']);
  });

  it('returns null when no term resolves', async () => {
    const { resolver } = setup({});
    expect(await resolver.resolve(['Unknown Place', '   '])).toBeNull();
    expect(await resolver.resolve([])).toBeNull();
  });

  it('looks a term up once when asked for it concurrently', async () => {
    const { provider, resolver } = setup({ 'Northstar': { kind: 'found', coords: NORTHSTAR } });

    const results = await Promise.all([
      resolver.resolveTerm('Northstar'),
      resolver.resolveTerm('NORTHSTAR'),
    ]);

    expect(results).toEqual([NORTHSTAR, NORTHSTAR]);
    expect(provider.calls).toEqual(['Northstar']);
  });
});
