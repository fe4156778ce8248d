import { CONFIG } from './config';
import type { IStorage } from './storage';
import { ClassifiedsNavigator } from './services/browser-navigator';
import { createExtractionProvider } from './services/extraction-provider';
import { FieldExtractor } from './services/field-extractor';
import { loadGazetteer } from './services/gazetteer';
import { FileCacheBackend, GeocodeCache } from './services/geocode-cache';
import { IngestionRunner } from './services/ingestion-runner';
import { ListingMerger } from './services/listing-merger';
import { LocationResolver } from './services/location-resolver';
import { OneMapGeocoder } from './services/onemap-geocoder';

/**
 * Wire the production pipeline: Chromium navigator, OpenAI extraction with
 * regex fallback, gazetteer + file cache + OneMap geocoding.
 */
export async function createIngestionRunner(storage: IStorage): Promise<IngestionRunner> {
  const cache = new GeocodeCache(new FileCacheBackend(CONFIG.geocoding.cacheFile));
  await cache.init();

  const resolver = new LocationResolver({
    gazetteer: loadGazetteer(),
    cache,
    provider: new OneMapGeocoder({ url: CONFIG.geocoding.url, timeoutMs: CONFIG.geocoding.timeoutMs }),
  });

  const extractor = new FieldExtractor(createExtractionProvider(CONFIG.extraction));
  const merger = new ListingMerger({ storage, resolver, concurrency: CONFIG.ingestion.mergeConcurrency });

  return new IngestionRunner({
    storage,
    navigator: new ClassifiedsNavigator(CONFIG.navigator),
    extractor,
    merger,
    dateDelayMs: CONFIG.ingestion.dateDelayMs,
    defaultDaysBack: CONFIG.ingestion.defaultDaysBack,
  });
}
