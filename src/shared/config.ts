import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getHomewatchDir, isRecord } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const CHANNEL_KINDS = ['pushover', 'email', 'simulate'] as const;
export type ChannelKind = (typeof CHANNEL_KINDS)[number];

export const SourceConfigSchema = z.object({
  adapter: z.string().min(1),
  active: z.boolean().default(true),
  display_name: z.string().optional(),
  poll_interval_s: z.number().positive().optional(),
  jitter_s: z.number().min(0).optional(),
  params: z.record(z.string(), z.unknown()).default({}),
});

export const ConfigSchema = z.object({
  server: z
    .object({
      debug: z.boolean().default(false),
      simulate: z.boolean().default(false),
      poll_interval_min_s: z.number().positive().default(240),
      poll_interval_max_s: z.number().positive().default(360),
    })
    .default({}),

  fetch: z
    .object({
      timeout_ms: z.number().int().positive().default(15000),
      user_agent: z.string().default('homewatch/0.1'),
    })
    .default({}),

  store: z
    .object({
      path: z.string().default('~/.homewatch/seen.db'),
      write_max_attempts: z.number().int().min(1).max(20).default(5),
      write_base_delay_ms: z.number().int().min(0).default(100),
      write_max_delay_ms: z.number().int().min(0).default(2000),
    })
    .default({}),

  notify: z
    .object({
      channels: z.array(z.enum(CHANNEL_KINDS)).min(1).default(['pushover']),
      max_attempts: z.number().int().min(1).max(10).default(3),
      base_delay_ms: z.number().int().min(0).default(1000),
      max_delay_ms: z.number().int().min(0).default(30000),
      pushover: z
        .object({
          api_base: z.string().url().default('https://api.pushover.net/1'),
          app_token: z.string().default(''),
          user_key: z.string().default(''),
          device: z.string().optional(),
          priority: z.number().int().min(-2).max(1).optional(),
          timeout_ms: z.number().int().positive().default(10000),
        })
        .default({}),
      email: z
        .object({
          smtp_host: z.string().default(''),
          smtp_port: z.number().default(587),
          smtp_user: z.string().default(''),
          smtp_pass: z.string().default(''),
          from: z.string().default('homewatch@localhost'),
          to: z.array(z.string()).default([]),
        })
        .default({}),
      messages: z
        .object({
          listing_title: z.string().default('New listing on {source}'),
          startup: z.string().default('Listing watcher started'),
          shutdown: z.string().default('Listing watcher stopped because of an error'),
          server_title: z.string().default('homewatch'),
        })
        .default({}),
    })
    .default({}),

  sources: z.record(z.string(), SourceConfigSchema).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SourceConfigInput = z.infer<typeof SourceConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  const defaults = generateDefaultConfig();
  return yamlStringify(defaults);
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

export function parseConfig(rawConfig: unknown): Config {
  const parsed = ConfigSchema.safeParse(rawConfig ?? {});
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

/**
 * Load config from, in order: an explicit path, $HOMEWATCH_CONFIG,
 * ~/.homewatch/config.yaml, or a homewatch rc file found from the cwd.
 */
export async function loadConfig(opts: { path?: string; force?: boolean } = {}): Promise<Config> {
  if (cachedConfig && !opts.force && !opts.path) return cachedConfig;

  const explorer = cosmiconfig('homewatch', {
    searchPlaces: [
      'homewatch.config.yaml',
      'homewatch.config.yml',
      '.homewatchrc.yaml',
      '.homewatchrc.yml',
    ],
  });

  const explicitPath = opts.path ?? process.env['HOMEWATCH_CONFIG'];
  const defaultConfigPath = path.join(getHomewatchDir(), 'config.yaml');

  let loaded: unknown = undefined;

  if (explicitPath) {
    const resolved = resolvePath(explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    loaded = (await explorer.load(resolved))?.config;
  } else if (fs.existsSync(defaultConfigPath)) {
    loaded = (await explorer.load(defaultConfigPath))?.config;
  } else {
    const result = await explorer.search();
    if (result) {
      loaded = result.config;
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const rawConfig: Record<string, unknown> = isRecord(loaded) ? loaded : {};

  // Pushover credentials may come from the environment instead of the file
  const envToken = process.env['HOMEWATCH_PUSHOVER_TOKEN'];
  const envUser = process.env['HOMEWATCH_PUSHOVER_USER'];

  if (envToken || envUser) {
    const notify: Record<string, unknown> = isRecord(rawConfig['notify']) ? rawConfig['notify'] : {};
    const pushover: Record<string, unknown> = isRecord(notify['pushover']) ? notify['pushover'] : {};
    if (envToken) pushover['app_token'] = envToken;
    if (envUser) pushover['user_key'] = envUser;
    notify['pushover'] = pushover;
    rawConfig['notify'] = notify;
  }

  cachedConfig = parseConfig(rawConfig);
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export interface PollTiming {
  intervalMs: number;
  jitterMs: number;
}

/**
 * Per-source poll timing. Sources without their own values inherit the
 * server-wide min/max window: interval = min, jitter = max - min.
 */
export function resolvePollTiming(config: Config, source: SourceConfigInput): PollTiming {
  const min = config.server.poll_interval_min_s;
  let max = config.server.poll_interval_max_s;
  if (min > max) {
    max = min + 5;
  }
  const intervalS = source.poll_interval_s ?? min;
  const jitterS = source.jitter_s ?? max - min;
  return { intervalMs: Math.round(intervalS * 1000), jitterMs: Math.round(jitterS * 1000) };
}
