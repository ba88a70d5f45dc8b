#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getHomewatchDir } from '../shared/utils.js';
import { openSeenStore } from '../store/seenStore.js';
import { SimulatedChannel } from '../notify/simulate.js';
import {
  buildSourceConfigs,
  createChannel,
  createService,
  runService,
} from '../runtime/service.js';

const program = new Command();

program
  .name('homewatch')
  .description('Watch listing sites and push a notification for every new listing')
  .version('0.1.0');

interface GlobalOpts {
  config?: string;
  verbose?: boolean;
}

program
  .option('-c, --config <path>', 'Configuration file')
  .option('-v, --verbose', 'Log debug information');

async function setup(): Promise<Config> {
  const opts = program.opts<GlobalOpts>();
  const config = await loadConfig({ path: opts.config });
  if (opts.verbose || config.server.debug) {
    logger.level = 'debug';
    logger.debug('Running in verbose mode');
  }
  if (config.server.simulate) {
    logger.info('Simulation mode: notifications are logged, not sent');
  }
  return config;
}

// === init ===
program
  .command('init')
  .description('Create a default config at ~/.homewatch/config.yaml')
  .action(() => {
    const configPath = path.join(getHomewatchDir(), 'config.yaml');
    if (fs.existsSync(configPath)) {
      log(`✓ ${configPath} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${configPath} created. Add your sources and Pushover keys, then run: homewatch run`);
  });

// === run ===
program
  .command('run', { isDefault: true })
  .description('Poll all active sources and notify about new listings')
  .option('-o, --oneshot', 'Run every source once, then exit', false)
  .option('--reseed', 'Record all current listings as seen without notifying, then continue', false)
  .action(async (opts: { oneshot: boolean; reseed: boolean }) => {
    const config = await setup();
    const service = createService(config);
    for (const worker of service.workers) {
      const { name, adapter, poll_interval_ms, jitter_ms } = worker.source;
      logger.info(
        { source: name, adapter, intervalMs: poll_interval_ms, jitterMs: jitter_ms },
        'Source configured',
      );
    }
    process.exitCode = await runService(service, opts);
  });

// === seed ===
program
  .command('seed')
  .description('Record all current listings as seen without notifying')
  .action(async () => {
    const config = await setup();
    // Seeding never notifies, so it needs no channel credentials
    const service = createService(config, { channel: new SimulatedChannel() });
    try {
      await service.store.load();
      for (const worker of service.workers) {
        const report = await worker.seed();
        log(`✓ ${report.source.padEnd(20)} ${report.seeded} seeded of ${report.fetched} fetched`);
      }
    } finally {
      service.store.close();
    }
  });

// === status ===
program
  .command('status')
  .description('Show seen listing counts per source')
  .action(async () => {
    const config = await setup();
    const store = await openSeenStore(config.store.path);
    try {
      const stats = store.stats();
      if (stats.length === 0) {
        log('No listings recorded yet.');
        return;
      }
      for (const row of stats) {
        log(`${row.source_id.padEnd(20)} ${row.status.padEnd(10)} ${String(row.count).padStart(6)}`);
      }
    } finally {
      store.close();
    }
  });

// === sources ===
program
  .command('sources')
  .description('List configured sources')
  .action(async () => {
    const config = await setup();
    const sources = buildSourceConfigs(config);
    if (sources.length === 0) {
      log('No sources configured.');
      return;
    }
    for (const s of sources) {
      const status = s.active ? '●' : '○';
      const interval = `${Math.round(s.poll_interval_ms / 1000)}s +${Math.round(s.jitter_ms / 1000)}s`;
      log(`${status} ${s.name.padEnd(20)} ${s.adapter.padEnd(6)} ${interval}`);
    }
  });

// === notify-test ===
program
  .command('notify-test')
  .description('Send a test notification through the configured channel')
  .action(async () => {
    const config = await setup();
    const channel = createChannel(config);
    await channel.send({
      title: config.notify.messages.server_title,
      body: 'Test notification',
    });
    log(`✓ Test notification sent via ${channel.name}`);
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  logger.fatal({ error: errorMessage(err) }, 'homewatch failed');
  process.exitCode = 1;
});
