import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().optional(),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

  SOURCE_URL: z.string().url().default('https://www.stclassifieds.sg/section/sub/list/properties/759'),
  CHROMIUM_PATH: z.string().optional(),
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  DATE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  DEFAULT_DAYS_BACK: z.coerce.number().int().positive().default(7),

  GEOCODE_URL: z.string().url().default('https://www.onemap.gov.sg/api/common/elastic/search'),
  GEOCODE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  GEOCODE_CACHE_FILE: z.string().default('data/geocode_cache.json'),

  MERGE_CONCURRENCY: z.coerce.number().int().positive().default(4),
});

// Empty strings from .env files count as unset
const rawEnv = Object.fromEntries(
  Object.entries(process.env).filter(([, value]) => value !== undefined && value !== '')
);

const env = envSchema.parse(rawEnv);

export const CONFIG = {
  nodeEnv: env.NODE_ENV,
  port: env.PORT,
  databaseUrl: env.DATABASE_URL,
  extraction: {
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
    timeoutMs: env.EXTRACTION_TIMEOUT_MS,
  },
  navigator: {
    sourceUrl: env.SOURCE_URL,
    chromiumPath: env.CHROMIUM_PATH,
    timeoutMs: env.NAVIGATION_TIMEOUT_MS,
  },
  geocoding: {
    url: env.GEOCODE_URL,
    timeoutMs: env.GEOCODE_TIMEOUT_MS,
    cacheFile: env.GEOCODE_CACHE_FILE,
  },
  ingestion: {
    dateDelayMs: env.DATE_DELAY_MS,
    defaultDaysBack: env.DEFAULT_DAYS_BACK,
    mergeConcurrency: env.MERGE_CONCURRENCY,
  },
} as const;
