import { JSDOM } from 'jsdom';
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
import { FetchError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

const HtmlParamsSchema = z.object({
  url: z.string().url(),
  item_selector: z.string().min(1),
  id_attribute: z.string().min(1).optional(),
  link_selector: z.string().min(1).default('a[href]'),
  title_selector: z.string().min(1).optional(),
  price_selector: z.string().min(1).optional(),
});

export type HtmlParams = z.infer<typeof HtmlParamsSchema>;

function textOf(el: Element | null): string {
  return (el?.textContent ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Extract listings from a result page. Each element matching `item_selector`
 * is one candidate; relative links resolve against the page url.
 */
export function parseListingsHtml(
  html: string,
  params: HtmlParams,
  sourceName: string,
  observedAt: string,
): Listing[] {
  let doc: Document;
  try {
    doc = new JSDOM(html, { url: params.url }).window.document;
  } catch (err) {
    throw new FetchError(`HTML parse failed: ${errorMessage(err)}`, 'permanent', { url: params.url });
  }

  let items: Element[];
  try {
    items = Array.from(doc.querySelectorAll(params.item_selector));
  } catch (err) {
    throw new FetchError(`Invalid item selector: ${errorMessage(err)}`, 'permanent', {
      selector: params.item_selector,
    });
  }

  const listings: Listing[] = [];
  for (const item of items) {
    const link = item.matches(params.link_selector) ? item : item.querySelector(params.link_selector);
    const href = link?.getAttribute('href')?.trim();
    const url = href ? resolveListingUrl(href, params.url) : null;
    if (href && !url) {
      logger.warn({ source: sourceName, href }, 'Skipping listing with an invalid link');
      continue;
    }

    const title = params.title_selector
      ? textOf(item.querySelector(params.title_selector))
      : textOf(link);
    if (!title && !url) continue;

    const priceText = params.price_selector ? textOf(item.querySelector(params.price_selector)) : '';
    const price = priceText || null;

    const siteId = params.id_attribute ? item.getAttribute(params.id_attribute) : null;

    listings.push({
      source_id: sourceName,
      listing_id: deriveListingId({ siteId, url, title, price }),
      url: url ?? params.url,
      title: title || (url ?? params.url),
      price,
      observed_at: observedAt,
    });
  }

  return listings;
}

export class HtmlAdapter implements SourceAdapter {
  readonly kind = 'html';

  constructor(
    private readonly timeoutMs: number = 15000,
    private readonly userAgent: string = 'homewatch/0.1',
  ) {}

  validate(source: SourceConfig): void {
    parseAdapterParams(HtmlParamsSchema, source);
  }

  async fetch(source: SourceConfig, signal?: AbortSignal): Promise<Listing[]> {
    const params = parseAdapterParams(HtmlParamsSchema, source);
    const html = await fetchPage(params.url, {
      timeoutMs: this.timeoutMs,
      userAgent: this.userAgent,
      signal,
    });

    const listings = parseListingsHtml(html, params, source.name, new Date().toISOString());
    logger.debug({ source: source.name, count: listings.length }, 'HTML page parsed');
    return listings;
  }
}
