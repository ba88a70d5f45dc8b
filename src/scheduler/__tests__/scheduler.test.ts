import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { Scheduler } from '../scheduler.js';
import { SourceWorker, type CycleReport } from '../../worker/sourceWorker.js';
import { NotificationDispatcher, type DispatcherOptions } from '../../notify/dispatcher.js';
import type { NotificationChannel, PushMessage } from '../../notify/channel.js';
import { SqliteSeenStore, type SeenStore } from '../../store/seenStore.js';
import type { Listing, SourceAdapter, SourceConfig } from '../../source/adapter.js';
import { DeliveryError, FetchError } from '../../shared/errors.js';
import { abortError, sleep } from '../../shared/utils.js';

const noSleep = async (): Promise<void> => undefined;

function sourceConfig(name: string, overrides: Partial<SourceConfig> = {}): SourceConfig {
  return {
    name,
    adapter: 'fake',
    display_name: name,
    active: true,
    poll_interval_ms: 1000,
    jitter_ms: 200,
    params: {},
    ...overrides,
  };
}

// Every fetch returns one listing nobody has seen before.
function freshAdapter(): SourceAdapter & { calls: number } {
  return {
    kind: 'fake',
    calls: 0,
    validate: () => undefined,
    async fetch(source: SourceConfig): Promise<Listing[]> {
      this.calls++;
      return [
        {
          source_id: source.name,
          listing_id: `id:${this.calls}`,
          url: `https://example.com/${source.name}/${this.calls}`,
          title: `Listing ${this.calls}`,
          price: null,
          observed_at: '2024-05-01T10:00:00.000Z',
        },
      ];
    },
  };
}

function failingAdapter(): SourceAdapter {
  return {
    kind: 'fake',
    validate: () => undefined,
    fetch: async () => {
      throw new FetchError('Fetch failed: 500 from x', 'transient');
    },
  };
}

function fakeChannel() {
  const send = vi.fn(async (_message: PushMessage): Promise<void> => undefined);
  const channel: NotificationChannel = { name: 'fake', send };
  return { channel, send };
}

function makeWorker(
  source: SourceConfig,
  adapter: SourceAdapter,
  store: SeenStore,
  channel: NotificationChannel,
  dispatcher: Partial<DispatcherOptions> = {},
) {
  return new SourceWorker({
    source,
    adapter,
    store,
    dispatcher: new NotificationDispatcher({
      channel,
      render: (l) => ({ title: l.source_id, body: l.listing_id }),
      maxAttempts: 1,
      baseDelayMs: 0,
      maxDelayMs: 0,
      sleep: noSleep,
      ...dispatcher,
    }),
  });
}

// Settles to 'pending' if the promise has not resolved within a short wait.
function settledWithin(promise: Promise<void>, ms = 20): Promise<'resolved' | 'pending'> {
  return Promise.race([
    promise.then(() => 'resolved' as const),
    new Promise<'pending'>((resolve) => setTimeout(() => resolve('pending'), ms)),
  ]);
}

describe('Scheduler', () => {
  let store: SqliteSeenStore;

  beforeEach(() => {
    store = new SqliteSeenStore(new Database(':memory:'), { sleep: noSleep });
  });

  afterEach(() => {
    store.close();
  });

  it('runs every source once with runOnce', async () => {
    const { channel, send } = fakeChannel();
    const scheduler = new Scheduler({
      store,
      workers: [
        makeWorker(sourceConfig('flats'), freshAdapter(), store, channel),
        makeWorker(sourceConfig('houses'), failingAdapter(), store, channel),
      ],
    });

    const reports = await scheduler.runOnce();

    expect(reports.map((r) => [r.source, r.delivered, r.fetchFailed])).toEqual([
      ['flats', 1, 0],
      ['houses', 0, 1],
    ]);
    expect(send).toHaveBeenCalledTimes(1);
    expect(store.hasSeen('flats', 'id:1')).toBe(true);
  });

  it('keeps healthy sources polling while another keeps failing', async () => {
    const { channel } = fakeChannel();
    const reports: CycleReport[] = [];
    let stopping: Promise<void> | undefined;

    const scheduler = new Scheduler({
      store,
      workers: [
        makeWorker(sourceConfig('broken'), failingAdapter(), store, channel),
        makeWorker(sourceConfig('flats'), freshAdapter(), store, channel),
      ],
      sleep: noSleep,
      onReport: (report) => {
        reports.push(report);
        if (reports.filter((r) => r.source === 'flats').length === 3) {
          stopping = scheduler.stop();
        }
      },
    });

    await scheduler.start();
    await scheduler.done();
    await stopping;

    const flats = reports.filter((r) => r.source === 'flats');
    const broken = reports.filter((r) => r.source === 'broken');
    expect(flats.map((r) => r.delivered)).toEqual([1, 1, 1]);
    expect(broken.length).toBeGreaterThan(0);
    expect(broken.every((r) => r.fetchFailed === 1)).toBe(true);
    expect(store.stats()).toEqual([{ source_id: 'flats', status: 'delivered', count: 3 }]);
  });

  it('isolates a cycle that throws', async () => {
    const { channel } = fakeChannel();
    const adapter = freshAdapter();
    const brokenStore: SeenStore = {
      load: async () => undefined,
      hasSeen: () => false,
      markSeen: async () => {
        throw new Error('unexpected');
      },
      flush: async () => undefined,
    };
    let stopping: Promise<void> | undefined;

    const scheduler = new Scheduler({
      store,
      workers: [makeWorker(sourceConfig('flats'), adapter, brokenStore, channel)],
      sleep: async () => {
        if (adapter.calls === 3) {
          stopping = scheduler.stop();
          throw abortError();
        }
      },
    });

    await scheduler.start();
    await scheduler.done();
    await stopping;

    expect(adapter.calls).toBe(3);
  });

  it('waits interval plus scaled jitter between cycles', async () => {
    const { channel } = fakeChannel();
    const delays: number[] = [];
    let stopping: Promise<void> | undefined;

    const scheduler = new Scheduler({
      store,
      workers: [makeWorker(sourceConfig('flats'), freshAdapter(), store, channel)],
      random: () => 0.5,
      sleep: async (ms) => {
        delays.push(ms);
        stopping = scheduler.stop();
        throw abortError();
      },
    });

    await scheduler.start();
    await scheduler.done();
    await stopping;

    expect(delays).toEqual([1100]);
  });

  it('stops every loop and marks workers stopped', async () => {
    const { channel } = fakeChannel();
    const scheduler = new Scheduler({
      store,
      workers: [
        makeWorker(sourceConfig('flats'), freshAdapter(), store, channel),
        makeWorker(sourceConfig('houses'), freshAdapter(), store, channel),
      ],
    });

    await scheduler.start();
    await scheduler.stop();
    await scheduler.stop();

    expect(scheduler.signal.aborted).toBe(true);
    expect(scheduler.states()).toEqual({ flats: 'stopped', houses: 'stopped' });
  });

  it('lets an in-flight send finish on stop and records the listing', async () => {
    const releases: Array<() => void> = [];
    const send = vi.fn(
      (_message: PushMessage) =>
        new Promise<void>((resolve) => {
          releases.push(resolve);
        }),
    );
    const channel: NotificationChannel = { name: 'fake', send };
    const scheduler = new Scheduler({
      store,
      workers: [makeWorker(sourceConfig('flats'), freshAdapter(), store, channel)],
    });

    await scheduler.start();
    await vi.waitFor(() => expect(send).toHaveBeenCalledTimes(1));

    const stopping = scheduler.stop();
    expect(await settledWithin(stopping)).toBe('pending');

    releases[0]?.();
    await stopping;

    expect(send).toHaveBeenCalledTimes(1);
    expect(store.hasSeen('flats', 'id:1')).toBe(true);
    expect(scheduler.states()).toEqual({ flats: 'stopped' });
  });

  it('cancels a backoff wait on stop and leaves the listing unseen', async () => {
    const { channel, send } = fakeChannel();
    send.mockRejectedValue(new DeliveryError('Pushover returned 503', 'transient'));
    const backoff = vi.fn((ms: number, signal?: AbortSignal) => sleep(ms, signal));
    const reports: CycleReport[] = [];
    const scheduler = new Scheduler({
      store,
      workers: [
        makeWorker(sourceConfig('flats'), freshAdapter(), store, channel, {
          maxAttempts: 3,
          baseDelayMs: 60_000,
          maxDelayMs: 60_000,
          sleep: backoff,
        }),
      ],
      onReport: (r) => reports.push(r),
    });

    await scheduler.start();
    await vi.waitFor(() => expect(backoff).toHaveBeenCalledTimes(1));

    await scheduler.stop();

    expect(send).toHaveBeenCalledTimes(1);
    expect(store.hasSeen('flats', 'id:1')).toBe(false);
    expect(reports.map((r) => [r.cancelled, r.delivered, r.abandoned])).toEqual([[true, 0, 0]]);
    expect(scheduler.states()).toEqual({ flats: 'stopped' });
  });
});
