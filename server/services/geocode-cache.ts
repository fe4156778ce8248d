/**
 * Persistent geocode cache
 *
 * Whole-document JSON: `{ "<lower-cased term>": [lat, lng] | null }`, where
 * null is an explicit "not found" marker. Loaded once, rewritten in full after
 * every store. Writes go through a single queue so they never interleave.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import pLimit from 'p-limit';
import { z } from 'zod';
import type { GeocodeResult } from '@shared/types/pipeline';
import { errorMessage } from '../errors';

const cacheDocumentSchema = z.record(z.tuple([z.number(), z.number()]).nullable());

export type CacheDocument = z.infer<typeof cacheDocumentSchema>;

export type CacheLookup =
  | { hit: false }
  | { hit: true; value: GeocodeResult };

export interface CacheBackend {
  load(): Promise<CacheDocument>;
  save(document: CacheDocument): Promise<void>;
}

export function cacheKey(term: string): string {
  return term.trim().toLowerCase();
}

export class FileCacheBackend implements CacheBackend {
  constructor(private file: string) {}

  async load(): Promise<CacheDocument> {
    let content: string;
    try {
      content = await readFile(this.file, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    const parsed = cacheDocumentSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      console.warn(`[CACHE] ⚠️ ${this.file} is not a valid cache document, starting empty`);
      return {};
    }
    return parsed.data;
  }

  async save(document: CacheDocument): Promise<void> {
    await mkdir(dirname(this.file), { recursive: true });
    const tmp = `${this.file}.tmp`;
    await writeFile(tmp, JSON.stringify(document));
    await rename(tmp, this.file);
  }
}

export class MemoryCacheBackend implements CacheBackend {
  saves = 0;

  constructor(public document: CacheDocument = {}) {}

  async load(): Promise<CacheDocument> {
    return { ...this.document };
  }

  async save(document: CacheDocument): Promise<void> {
    this.saves++;
    this.document = { ...document };
  }
}

export class GeocodeCache {
  private entries = new Map<string, GeocodeResult>();
  private writer = pLimit(1);
  private loaded = false;

  constructor(private backend: CacheBackend) {}

  async init(): Promise<void> {
    if (this.loaded) return;
    const document = await this.backend.load();
    for (const [key, value] of Object.entries(document)) {
      this.entries.set(key, value ? { latitude: value[0], longitude: value[1] } : null);
    }
    this.loaded = true;
    console.log(`[CACHE] Loaded ${this.entries.size} geocode entries`);
  }

  lookup(term: string): CacheLookup {
    const key = cacheKey(term);
    if (!this.entries.has(key)) return { hit: false };
    return { hit: true, value: this.entries.get(key) ?? null };
  }

  /**
   * Record a result (found or not-found) and persist the whole document.
   * A failed write is logged; the in-memory entry stays.
   */
  async store(term: string, value: GeocodeResult): Promise<void> {
    this.entries.set(cacheKey(term), value);
    const snapshot = this.toDocument();

    await this.writer(async () => {
      try {
        await this.backend.save(snapshot);
      } catch (error) {
        console.error(`[CACHE] ❌ Failed to persist geocode cache: ${errorMessage(error)}`);
      }
    });
  }

  /** Resolves once every queued write has finished. */
  async flush(): Promise<void> {
    await this.writer(async () => undefined);
  }

  get size(): number {
    return this.entries.size;
  }

  private toDocument(): CacheDocument {
    const document: CacheDocument = {};
    for (const [key, value] of this.entries) {
      document[key] = value ? [value.latitude, value.longitude] : null;
    }
    return document;
  }
}
