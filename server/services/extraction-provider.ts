/**
 * Generative extraction provider
 *
 * Sends every block of a run in ONE request and hands back the parsed JSON
 * items untouched. Alignment and normalization happen in the field extractor;
 * this module never trusts the order of what comes back.
 */

import OpenAI from 'openai';
import { errorMessage } from '../errors';

export interface ProviderRequestItem {
  index: number;
  text: string;
  category: string;
}

export type ProviderResult =
  | { kind: 'success'; data: unknown[] }
  | { kind: 'failure'; reason: string };

export interface ExtractionProvider {
  readonly name: string;
  extractBatch(items: ProviderRequestItem[]): Promise<ProviderResult>;
}

const SYSTEM_PROMPT = 'You are an expert at parsing Singapore commercial/industrial property classified ads. You answer with JSON only.';

export function buildBatchPrompt(items: ProviderRequestItem[]): string {
  return `I will give you a list of property listings. For EACH listing, extract structured information.
Return a JSON object {"listings": [...]} with one object per listing.

LISTINGS TO PROCESS:
${JSON.stringify(items, null, 2)}

For each listing, extract:
{
  "listing_index": <the "index" of the input listing this object describes>,
  "property_name": "Building/property name (e.g. 'Ubi Techpark', 'Sim Lim Tower', 'Northstar AMK') or null",
  "address": "Any address or location hint (e.g. 'Tuas Ave 1', 'opp Aljunied MRT', 'near Tai Seng') or null",
  "property_type": "One of: Factory/Warehouse, Office, Shop, Mixed, Other",
  "property_subtype": "B1, B2 or similar zoning, or null",
  "transaction_type": "One of: Sale, Rent, Both, or null",
  "price": <numeric price in SGD, e.g. 3550000 for $3.55M, 14000 for $14K, or null>,
  "price_type": "total, per_sqft or per_month, or null",
  "gfa_sqft": <floor area in sqft as a number, or null>,
  "lease_type": "Freehold, 999yr, 99yr, 60yr, 30yr, or null",
  "lease_balance_years": <remaining lease in years, or null>,
  "floor_level": "Ground, high floor, a level number, or null",
  "features": ["short feature strings, e.g. 'ramp-up', 'parking'"],
  "contact_name": "Contact person name or null",
  "contact_phone": "8-digit Singapore phone number or null",
  "is_owner": <true if the ad says 'owner' or 'direct owner', else false>,
  "is_agent": <true if an agency (PropNex, ERA, OrangeTee, Huttons, Dennis Wee) is named or the ad reads as an agent's, else false>,
  "agency_name": "Agency name if mentioned, or null",
  "cobroke_allowed": <true/false if co-broking is mentioned, else null>
}

Phone numbers are 8 digits starting with 6, 8 or 9. Every object MUST carry listing_index.`;
}

/**
 * Parse the provider's text into an item list. Accepts a bare array or
 * {"listings": [...]}, with or without a markdown code fence.
 */
export function parseProviderPayload(text: string): ProviderResult {
  const body = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return { kind: 'failure', reason: `invalid JSON: ${errorMessage(error)}` };
  }

  if (Array.isArray(parsed)) {
    return { kind: 'success', data: parsed };
  }
  if (typeof parsed === 'object' && parsed !== null && 'listings' in parsed && Array.isArray(parsed.listings)) {
    return { kind: 'success', data: parsed.listings };
  }
  return { kind: 'failure', reason: 'response is not a JSON array' };
}

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class OpenAIExtractionProvider implements ExtractionProvider {
  readonly name = 'openai';
  private client: OpenAI;
  private model: string;

  constructor(options: OpenAIProviderOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 1 });
    this.model = options.model;
  }

  async extractBatch(items: ProviderRequestItem[]): Promise<ProviderResult> {
    console.log(`[EXTRACTOR] 🤖 Sending ${items.length} listings to ${this.model}...`);

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        temperature: 0.1,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildBatchPrompt(items) },
        ],
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        return { kind: 'failure', reason: 'empty response' };
      }
      return parseProviderPayload(content);
    } catch (error) {
      return { kind: 'failure', reason: errorMessage(error) };
    }
  }
}

/**
 * Null when no API key is configured: the extractor then goes straight to the fallback.
 */
export function createExtractionProvider(options: {
  apiKey?: string;
  model: string;
  timeoutMs: number;
}): ExtractionProvider | null {
  if (!options.apiKey) {
    console.log('[EXTRACTOR] OpenAI not configured, AI extraction disabled');
    return null;
  }
  return new OpenAIExtractionProvider({ apiKey: options.apiKey, model: options.model, timeoutMs: options.timeoutMs });
}
