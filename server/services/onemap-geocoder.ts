import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Coordinates } from '@shared/types/pipeline';
import { errorMessage } from '../errors';

export type GeocodeSearchResult =
  | { kind: 'found'; coords: Coordinates }
  | { kind: 'empty' }
  | { kind: 'error'; reason: string };

export interface GeocodingProvider {
  search(term: string): Promise<GeocodeSearchResult>;
}

const searchResponseSchema = z.object({
  found: z.coerce.number().default(0),
  results: z.array(z.object({
    LATITUDE: z.coerce.number(),
    LONGITUDE: z.coerce.number(),
  }).passthrough()).default([]),
});

export interface OneMapGeocoderOptions {
  url: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

/**
 * OneMap elastic search. First result wins; a zero coordinate counts as empty.
 */
export class OneMapGeocoder implements GeocodingProvider {
  private http: AxiosInstance;
  private url: string;

  constructor(options: OneMapGeocoderOptions) {
    this.url = options.url;
    this.http = options.http ?? axios.create({
      timeout: options.timeoutMs,
      headers: { 'Accept': 'application/json' },
    });
  }

  async search(term: string): Promise<GeocodeSearchResult> {
    try {
      const response = await this.http.get<unknown>(this.url, {
        params: {
          searchVal: term,
          returnGeom: 'Y',
          getAddrDetails: 'Y',
          pageNum: 1,
        },
      });

      const parsed = searchResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        return { kind: 'error', reason: 'unexpected response shape' };
      }

      const first = parsed.data.results[0];
      if (parsed.data.found <= 0 || !first) {
        return { kind: 'empty' };
      }
      if (!first.LATITUDE || !first.LONGITUDE || !isFinite(first.LATITUDE) || !isFinite(first.LONGITUDE)) {
        return { kind: 'empty' };
      }

      return { kind: 'found', coords: { latitude: first.LATITUDE, longitude: first.LONGITUDE } };
    } catch (error) {
      return { kind: 'error', reason: errorMessage(error) };
    }
  }
}
