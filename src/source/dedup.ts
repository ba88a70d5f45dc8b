import { sha1 } from '../shared/utils.js';

/**
 * Normalize a URL for identity comparison:
 * - Strip trailing slashes
 * - Remove www. prefix
 * - Remove common tracking params (utm_*, ref, fbclid, etc.)
 * - Sort remaining query params
 * - Lowercase scheme + host
 */
export function normalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    // Not absolute; compare as-is trimmed
    return raw.trim();
  }

  url.protocol = url.protocol.toLowerCase();
  url.hostname = url.hostname.toLowerCase();

  if (url.hostname.startsWith('www.')) {
    url.hostname = url.hostname.slice(4);
  }

  const trackingPrefixes = ['utm_', 'ref', 'fbclid', 'gclid', 'mc_', 'mkt_'];
  const keysToRemove: string[] = [];
  for (const key of url.searchParams.keys()) {
    if (trackingPrefixes.some((p) => key.toLowerCase().startsWith(p))) {
      keysToRemove.push(key);
    }
  }
  for (const key of keysToRemove) {
    url.searchParams.delete(key);
  }

  url.searchParams.sort();

  let pathname = url.pathname;
  while (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }
  if (pathname === '/') {
    pathname = '';
  }

  const search = url.searchParams.toString();
  return `${url.protocol}//${url.hostname}${url.port ? ':' + url.port : ''}${pathname}${search ? '?' + search : ''}`;
}

export interface ListingIdInput {
  siteId?: string | null;
  url?: string | null;
  title: string;
  price?: string | null;
}

/**
 * Listing identity with priority: site-assigned id > normalized url > hash(title+price).
 */
export function deriveListingId(input: ListingIdInput): string {
  const siteId = input.siteId?.trim();
  if (siteId) {
    return `id:${siteId}`;
  }
  const url = input.url?.trim();
  if (url) {
    return `url:${normalizeUrl(url)}`;
  }
  return `hash:${sha1(input.title.trim() + '\n' + (input.price?.trim() ?? ''))}`;
}
