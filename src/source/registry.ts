import type { Config } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import type { SourceAdapter, SourceConfig } from './adapter.js';
import { HtmlAdapter } from './html.js';
import { JsonAdapter } from './json.js';
import { RssAdapter } from './rss.js';

export type AdapterRegistry = ReadonlyMap<string, SourceAdapter>;

export function createAdapterRegistry(config: Config['fetch']): AdapterRegistry {
  const adapters: SourceAdapter[] = [
    new RssAdapter(config.timeout_ms, config.user_agent),
    new HtmlAdapter(config.timeout_ms, config.user_agent),
    new JsonAdapter(config.timeout_ms, config.user_agent),
  ];
  return new Map(adapters.map((a) => [a.kind, a]));
}

/**
 * Look up and validate the adapter for a source. Unknown kinds and bad
 * params fail at startup rather than on every poll.
 */
export function resolveAdapter(registry: AdapterRegistry, source: SourceConfig): SourceAdapter {
  const adapter = registry.get(source.adapter);
  if (!adapter) {
    throw new ConfigError(
      `Unknown adapter "${source.adapter}" for source "${source.name}". Available: ${[...registry.keys()].join(', ')}`,
      { source: source.name, adapter: source.adapter },
    );
  }
  adapter.validate(source);
  return adapter;
}
