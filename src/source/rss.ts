import Parser from 'rss-parser';
import { z } from 'zod';
import {
  parseAdapterParams,
  type Listing,
  type SourceAdapter,
  type SourceConfig,
} from './adapter.js';
import { deriveListingId } from './dedup.js';
import { fetchPage } from './http.js';
import { FetchError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

const RssParamsSchema = z.object({
  url: z.string().url(),
});

interface PriceFields {
  price?: string;
}

const parser: Parser<Record<string, unknown>, PriceFields> = new Parser({
  customFields: {
    item: ['price'],
  },
});

/**
 * Search pages that publish a feed of their results.
 */
export class RssAdapter implements SourceAdapter {
  readonly kind = 'rss';

  constructor(
    private readonly timeoutMs: number = 15000,
    private readonly userAgent: string = 'homewatch/0.1',
  ) {}

  validate(source: SourceConfig): void {
    parseAdapterParams(RssParamsSchema, source);
  }

  async fetch(source: SourceConfig, signal?: AbortSignal): Promise<Listing[]> {
    const params = parseAdapterParams(RssParamsSchema, source);

    const xml = await fetchPage(params.url, {
      timeoutMs: this.timeoutMs,
      userAgent: this.userAgent,
      accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
      signal,
    });

    let feed: Awaited<ReturnType<typeof parser.parseString>>;
    try {
      feed = await parser.parseString(xml);
    } catch (err) {
      throw new FetchError(`Feed parse failed: ${errorMessage(err)}`, 'permanent', {
        url: params.url,
      });
    }

    const observedAt = new Date().toISOString();
    const listings: Listing[] = [];
    for (const entry of feed.items) {
      const title = entry.title?.trim();
      const url = entry.link?.trim();
      if (!title || !url) continue;

      const price = typeof entry.price === 'string' && entry.price.trim() ? entry.price.trim() : null;
      listings.push({
        source_id: source.name,
        listing_id: deriveListingId({ siteId: entry.guid, url, title, price }),
        url,
        title,
        price,
        observed_at: observedAt,
      });
    }

    logger.debug({ source: source.name, count: listings.length }, 'RSS fetched');
    return listings;
  }
}
