import { readFileSync } from 'fs';
import { z } from 'zod';
import type { Coordinates } from '@shared/types/pipeline';

const gazetteerSchema = z.array(z.object({
  name: z.string().min(1),
  latitude: z.number(),
  longitude: z.number(),
}));

export type GazetteerEntry = z.infer<typeof gazetteerSchema>[number];

const DEFAULT_GAZETTEER_FILE = new URL('../../data/gazetteer.json', import.meta.url);

/**
 * Static list of well-known areas with fixed coordinates.
 * A term matches an entry when it contains the entry's name (case-insensitive);
 * longer names are tried first so "jurong west" beats "jurong".
 */
export class Gazetteer {
  private entries: GazetteerEntry[];

  constructor(entries: GazetteerEntry[]) {
    this.entries = entries
      .map(e => ({ ...e, name: e.name.toLowerCase() }))
      .sort((a, b) => b.name.length - a.name.length);
  }

  get size(): number {
    return this.entries.length;
  }

  lookup(term: string): Coordinates | null {
    const needle = term.toLowerCase();
    const entry = this.entries.find(e => needle.includes(e.name));
    return entry ? { latitude: entry.latitude, longitude: entry.longitude } : null;
  }
}

export function loadGazetteer(file: string | URL = DEFAULT_GAZETTEER_FILE): Gazetteer {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  return new Gazetteer(gazetteerSchema.parse(raw));
}
