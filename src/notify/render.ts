import type { Config } from '../shared/config.js';
import type { Listing } from '../source/adapter.js';
import type { PushMessage } from './channel.js';

/**
 * Replace `{name}` placeholders; unknown names are left untouched.
 */
export function interpolate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export function renderListingMessage(
  listing: Listing,
  sourceDisplayName: string,
  messages: Config['notify']['messages'],
): PushMessage {
  const lines = [listing.title];
  if (listing.price) {
    lines.push(listing.price);
  }
  return {
    title: interpolate(messages.listing_title, {
      source: sourceDisplayName,
      title: listing.title,
      price: listing.price ?? '',
    }),
    body: lines.join('\n'),
    url: listing.url,
    urlTitle: sourceDisplayName,
  };
}
