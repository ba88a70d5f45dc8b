import type { z } from 'zod';
import { ConfigError } from '../shared/errors.js';

/**
 * A candidate listing observed on a source. Only `(source_id, listing_id)`
 * is identity; the rest is forwarded into the notification as-is.
 */
export interface Listing {
  source_id: string;
  listing_id: string;
  url: string;
  title: string;
  price: string | null;
  observed_at: string;
}

/**
 * Static configuration of one polled source, fixed for the process lifetime.
 */
export interface SourceConfig {
  name: string;
  adapter: string;
  display_name: string;
  active: boolean;
  poll_interval_ms: number;
  jitter_ms: number;
  params: Record<string, unknown>;
}

/**
 * Site adapter. Implement once per site kind.
 * `fetch` throws FetchError (transient | permanent); `validate` throws ConfigError.
 */
export interface SourceAdapter {
  readonly kind: string;
  validate(source: SourceConfig): void;
  fetch(source: SourceConfig, signal?: AbortSignal): Promise<Listing[]>;
}

/**
 * Resolve a listing link against the page it came from. Returns null for a
 * link that is not a valid URL.
 */
export function resolveListingUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

/**
 * Validate a source's adapter params against the adapter's schema.
 */
export function parseAdapterParams<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  source: SourceConfig,
): T {
  const parsed = schema.safeParse(source.params);
  if (!parsed.success) {
    throw new ConfigError(`Invalid params for source "${source.name}" (${source.adapter})`, {
      source: source.name,
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}
