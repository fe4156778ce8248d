import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FileCacheBackend, GeocodeCache, MemoryCacheBackend, type CacheBackend, type CacheDocument } from './geocode-cache';

describe('GeocodeCache', () => {
  it('serves loaded entries, including not-found markers', async () => {
    const cache = new GeocodeCache(new MemoryCacheBackend({ tuas: [1.32, 103.64], nowhere: null }));
    await cache.init();

    expect(cache.size).toBe(2);
    expect(cache.lookup('  Tuas ')).toEqual({ hit: true, value: { latitude: 1.32, longitude: 103.64 } });
    expect(cache.lookup('NOWHERE')).toEqual({ hit: true, value: null });
    expect(cache.lookup('Tai Seng')).toEqual({ hit: false });
  });

  it('persists the whole document on every store', async () => {
    const backend = new MemoryCacheBackend({ nowhere: null });
    const cache = new GeocodeCache(backend);
    await cache.init();

    await cache.store('Tai Seng MRT', { latitude: 1.336, longitude: 103.888 });

    expect(backend.saves).toBe(1);
    expect(backend.document).toEqual({ nowhere: null, 'tai seng mrt': [1.336, 103.888] });
  });

  it('keeps the in-memory entry when a write fails', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failing: CacheBackend = {
      load: async () => ({}),
      save: async () => {
        throw new Error('disk full');
      },
    };
    const cache = new GeocodeCache(failing);
    await cache.init();

    await cache.store('Tuas', null);

    expect(cache.lookup('tuas')).toEqual({ hit: true, value: null });
    expect(errors).toHaveBeenCalledTimes(1);
    errors.mockRestore();
  });

  it('serializes concurrent writes', async () => {
    const backend = new MemoryCacheBackend();
    const cache = new GeocodeCache(backend);
    await cache.init();

    await Promise.all([
      cache.store('a', null),
      cache.store('b', { latitude: 1.3, longitude: 103.8 }),
    ]);
    await cache.flush();

    expect(backend.saves).toBe(2);
    expect(backend.document).toEqual({ a: null, b: [1.3, 103.8] });
  });
});

describe('FileCacheBackend', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'geocode-cache-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    const backend = new FileCacheBackend(join(dir, 'missing.json'));
    expect(await backend.load()).toEqual({});
  });

  it('round-trips through a new cache instance', async () => {
    const file = join(dir, 'nested', 'geocode-cache.json');

    const first = new GeocodeCache(new FileCacheBackend(file));
    await first.init();
    await first.store('Tuas', { latitude: 1.32, longitude: 103.64 });
    await first.store('Nowhere', null);

    const written: unknown = JSON.parse(await readFile(file, 'utf-8'));
    expect(written).toEqual({ tuas: [1.32, 103.64], nowhere: null });

    const second = new GeocodeCache(new FileCacheBackend(file));
    await second.init();
    expect(second.lookup('tuas')).toEqual({ hit: true, value: { latitude: 1.32, longitude: 103.64 } });
    expect(second.lookup('nowhere')).toEqual({ hit: true, value: null });
  });

  it('ignores a document of the wrong shape', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const file = join(dir, 'bad.json');
    const bad = { tuas: 'somewhere' };
    await writeFile(file, JSON.stringify(bad));

    const document: CacheDocument = await new FileCacheBackend(file).load();

    expect(document).toEqual({});
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
