import type { EventEmitter } from 'node:events';
import { resolvePollTiming, type ChannelKind, type Config } from '../shared/config.js';
import { ConfigError, errorMessage, isAbortError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { SourceConfig } from '../source/adapter.js';
import { createAdapterRegistry, resolveAdapter, type AdapterRegistry } from '../source/registry.js';
import type { NotificationChannel } from '../notify/channel.js';
import { NotificationDispatcher } from '../notify/dispatcher.js';
import { EmailChannel } from '../notify/email.js';
import { FanoutChannel } from '../notify/fanout.js';
import { PushoverChannel } from '../notify/pushover.js';
import { renderListingMessage } from '../notify/render.js';
import { SimulatedChannel } from '../notify/simulate.js';
import { Scheduler } from '../scheduler/scheduler.js';
import { createSeenStore, type SqliteSeenStore } from '../store/seenStore.js';
import { SourceWorker, type CycleReport } from '../worker/sourceWorker.js';

/**
 * Flatten the `sources` map into runtime source configs (active and inactive).
 */
export function buildSourceConfigs(config: Config): SourceConfig[] {
  return Object.entries(config.sources).map(([name, source]) => {
    const timing = resolvePollTiming(config, source);
    return {
      name,
      adapter: source.adapter,
      display_name: source.display_name ?? name,
      active: source.active,
      poll_interval_ms: timing.intervalMs,
      jitter_ms: timing.jitterMs,
      params: source.params,
    };
  });
}

function createChannelOfKind(config: Config, kind: ChannelKind): NotificationChannel {
  switch (kind) {
    case 'simulate':
      return new SimulatedChannel();
    case 'email':
      return new EmailChannel(config.notify.email);
    case 'pushover':
      if (!config.notify.pushover.app_token || !config.notify.pushover.user_key) {
        throw new ConfigError(
          'notify.pushover.app_token and notify.pushover.user_key are required (or set server.simulate)',
        );
      }
      return new PushoverChannel(config.notify.pushover);
  }
}

/**
 * The channel every notification and server notice goes through: the single
 * configured channel, or a fan-out over all of them. Simulation replaces them all.
 */
export function createChannel(config: Config): NotificationChannel {
  if (config.server.simulate) {
    return new SimulatedChannel();
  }
  const channels = [...new Set(config.notify.channels)].map((kind) => createChannelOfKind(config, kind));
  return channels.length === 1 && channels[0] ? channels[0] : new FanoutChannel(channels);
}

export interface ServiceDeps {
  store?: SqliteSeenStore;
  channel?: NotificationChannel;
  adapters?: AdapterRegistry;
  onReport?: (report: CycleReport) => void;
}

export interface Service {
  config: Config;
  store: SqliteSeenStore;
  channel: NotificationChannel;
  workers: SourceWorker[];
  scheduler: Scheduler;
}

/**
 * Wire store, channel, adapters, workers and scheduler from config. The
 * store is opened but not loaded; Scheduler.start()/runOnce() load it.
 */
export function createService(config: Config, deps: ServiceDeps = {}): Service {
  const adapters = deps.adapters ?? createAdapterRegistry(config.fetch);
  const channel = deps.channel ?? createChannel(config);

  const sources = buildSourceConfigs(config).filter((s) => s.active);
  if (sources.length === 0) {
    throw new ConfigError('No active sources configured');
  }
  const resolved = sources.map((source) => ({ source, adapter: resolveAdapter(adapters, source) }));

  const store =
    deps.store ??
    createSeenStore(config.store.path, {
      writeMaxAttempts: config.store.write_max_attempts,
      writeBaseDelayMs: config.store.write_base_delay_ms,
      writeMaxDelayMs: config.store.write_max_delay_ms,
    });

  const workers = resolved.map(
    ({ source, adapter }) =>
      new SourceWorker({
        source,
        adapter,
        store,
        dispatcher: new NotificationDispatcher({
          channel,
          render: (listing) => renderListingMessage(listing, source.display_name, config.notify.messages),
          maxAttempts: config.notify.max_attempts,
          baseDelayMs: config.notify.base_delay_ms,
          maxDelayMs: config.notify.max_delay_ms,
        }),
      }),
  );

  const scheduler = new Scheduler({ store, workers, onReport: deps.onReport });

  return { config, store, channel, workers, scheduler };
}

/**
 * Best-effort server notice (startup / crash). Empty text disables it.
 */
export async function sendServerNotice(
  channel: NotificationChannel,
  messages: Config['notify']['messages'],
  body: string,
): Promise<void> {
  if (!body.trim()) return;
  try {
    await channel.send({ title: messages.server_title, body });
  } catch (err) {
    logger.warn({ channel: channel.name, error: errorMessage(err) }, 'Failed to send server notice');
  }
}

export interface RunOptions {
  oneshot?: boolean;
  reseed?: boolean;
  /** Where SIGINT/SIGTERM arrive from. Defaults to the process. */
  signals?: EventEmitter;
}

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Run until SIGINT/SIGTERM (or one pass with `oneshot`). Resolves with the
 * process exit code. Signal handlers are installed before the store loads,
 * so a signal during load, reseed or a oneshot pass also stops cleanly.
 */
export async function runService(service: Service, opts: RunOptions = {}): Promise<number> {
  const { scheduler, store, channel, config, workers } = service;
  const signals = opts.signals ?? process;

  const onSignal = (signal: string): void => {
    logger.info({ signal }, 'Received signal, shutting down');
    scheduler.stop().catch((err: unknown) => {
      logger.error({ error: errorMessage(err) }, 'Shutdown error');
    });
  };
  const handlers = SHUTDOWN_SIGNALS.map((signal) => ({ signal, handler: () => onSignal(signal) }));
  for (const { signal, handler } of handlers) {
    signals.once(signal, handler);
  }

  try {
    if (opts.reseed) {
      await store.load();
      for (const worker of workers) {
        if (scheduler.signal.aborted) break;
        await worker.seed(scheduler.signal);
      }
    }

    if (opts.oneshot) {
      const reports = await scheduler.runOnce();
      const failed = reports.filter((r) => r.fetchFailed > 0).length;
      logger.info({ sources: reports.length, failed }, 'One-shot run complete');
      if (scheduler.signal.aborted) await scheduler.stop();
      return 0;
    }

    await scheduler.start();
    if (!scheduler.signal.aborted) {
      await sendServerNotice(channel, config.notify.messages, config.notify.messages.startup);
    }

    await scheduler.done();
    await scheduler.stop();
    return 0;
  } catch (err) {
    if (scheduler.signal.aborted && isAbortError(err)) {
      await scheduler.stop();
      return 0;
    }
    logger.fatal({ error: errorMessage(err) }, 'Service stopped on a fatal error');
    const name = err instanceof Error ? err.name : 'Error';
    await sendServerNotice(
      channel,
      config.notify.messages,
      `${config.notify.messages.shutdown}\n\n${name}: ${errorMessage(err)}`,
    );
    await scheduler.stop();
    return 1;
  } finally {
    for (const { signal, handler } of handlers) {
      signals.off(signal, handler);
    }
    store.close();
  }
}
