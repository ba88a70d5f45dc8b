import { z } from 'zod';
import {
  parseAdapterParams,
  resolveListingUrl,
  type Listing,
  type SourceAdapter,
  type SourceConfig,
} from './adapter.js';
import { deriveListingId } from './dedup.js';
import { fetchPage } from './http.js';
import { FetchError } from '../shared/errors.js';
import { isRecord } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

const JsonParamsSchema = z.object({
  url: z.string().url(),
  items_path: z.string().default(''),
  id_field: z.string().min(1).optional(),
  url_field: z.string().min(1),
  title_field: z.string().min(1),
  price_field: z.string().min(1).optional(),
  url_base: z.string().url().optional(),
});

export type JsonParams = z.infer<typeof JsonParamsSchema>;

/**
 * Read a dot-separated path ("data.results.0.id") out of parsed JSON.
 */
export function getPath(value: unknown, dotPath: string): unknown {
  if (dotPath === '') return value;
  let current: unknown = value;
  for (const segment of dotPath.split('.')) {
    if (Array.isArray(current)) {
      current = current[Number(segment)];
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

function scalarText(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() || null;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

export function parseListingsJson(
  body: string,
  params: JsonParams,
  sourceName: string,
  observedAt: string,
): Listing[] {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    throw new FetchError(`Response from ${params.url} is not valid JSON`, 'permanent', {
      url: params.url,
    });
  }

  const items = getPath(data, params.items_path);
  if (!Array.isArray(items)) {
    throw new FetchError(
      `Expected an array at "${params.items_path || '<root>'}" in response from ${params.url}`,
      'permanent',
      { url: params.url, items_path: params.items_path },
    );
  }

  const base = params.url_base ?? params.url;
  const listings: Listing[] = [];
  for (const item of items) {
    const rawUrl = scalarText(getPath(item, params.url_field));
    const title = scalarText(getPath(item, params.title_field));
    if (!rawUrl || !title) continue;

    const url = resolveListingUrl(rawUrl, base);
    if (!url) {
      logger.warn({ source: sourceName, url: rawUrl }, 'Skipping listing with an invalid link');
      continue;
    }
    const price = params.price_field ? scalarText(getPath(item, params.price_field)) : null;
    const siteId = params.id_field ? scalarText(getPath(item, params.id_field)) : null;

    listings.push({
      source_id: sourceName,
      listing_id: deriveListingId({ siteId, url, title, price }),
      url,
      title,
      price,
      observed_at: observedAt,
    });
  }
  return listings;
}

/**
 * Sites with a JSON search endpoint.
 */
export class JsonAdapter implements SourceAdapter {
  readonly kind = 'json';

  constructor(
    private readonly timeoutMs: number = 15000,
    private readonly userAgent: string = 'homewatch/0.1',
  ) {}

  validate(source: SourceConfig): void {
    parseAdapterParams(JsonParamsSchema, source);
  }

  async fetch(source: SourceConfig, signal?: AbortSignal): Promise<Listing[]> {
    const params = parseAdapterParams(JsonParamsSchema, source);
    const body = await fetchPage(params.url, {
      timeoutMs: this.timeoutMs,
      userAgent: this.userAgent,
      accept: 'application/json',
      signal,
    });

    const listings = parseListingsJson(body, params, source.name, new Date().toISOString());
    logger.debug({ source: source.name, count: listings.length }, 'JSON listings fetched');
    return listings;
  }
}
