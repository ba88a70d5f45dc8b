import { FetchError, StoreError, errorMessage, isAbortError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { generateId } from '../shared/utils.js';
import type { Listing, SourceAdapter, SourceConfig } from '../source/adapter.js';
import type { NotificationDispatcher } from '../notify/dispatcher.js';
import type { SeenStore } from '../store/seenStore.js';

export type LoopState = 'idle' | 'fetching' | 'diffing' | 'delivering' | 'stopping' | 'stopped';

export interface CycleReport {
  source: string;
  cycleId: string;
  startedAt: string;
  durationMs: number;
  fetched: number;
  new: number;
  delivered: number;
  abandoned: number;
  fetchFailed: number;
  storeFailed: number;
  cancelled: boolean;
  error?: { kind: string; message: string };
}

export interface SeedReport {
  source: string;
  fetched: number;
  seeded: number;
}

export interface SourceWorkerDeps {
  source: SourceConfig;
  adapter: SourceAdapter;
  store: SeenStore;
  dispatcher: NotificationDispatcher;
}

function fetchErrorKind(err: unknown): string {
  if (err instanceof FetchError) return err.kind;
  return 'permanent';
}

/**
 * Owns one source's poll cycle: fetch, diff against the seen store, deliver,
 * then commit each listing's terminal outcome.
 */
export class SourceWorker {
  private current: LoopState = 'idle';

  constructor(private readonly deps: SourceWorkerDeps) {}

  get source(): SourceConfig {
    return this.deps.source;
  }

  get state(): LoopState {
    return this.current;
  }

  // Once stopping, only the final 'stopped' transition is taken.
  setState(state: LoopState): void {
    if (this.current === 'stopped') return;
    if (this.current === 'stopping' && state !== 'stopped') return;
    this.current = state;
  }

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const { source, adapter, store, dispatcher } = this.deps;
    const started = Date.now();
    const report: CycleReport = {
      source: source.name,
      cycleId: generateId(8),
      startedAt: new Date(started).toISOString(),
      durationMs: 0,
      fetched: 0,
      new: 0,
      delivered: 0,
      abandoned: 0,
      fetchFailed: 0,
      storeFailed: 0,
      cancelled: false,
    };

    try {
      this.setState('fetching');
      let candidates: Listing[];
      try {
        candidates = await adapter.fetch(source, signal);
      } catch (err) {
        if (isAbortError(err)) {
          report.cancelled = true;
        } else {
          report.fetchFailed = 1;
          report.error = { kind: fetchErrorKind(err), message: errorMessage(err) };
        }
        return this.finish(report, started);
      }
      report.fetched = candidates.length;

      this.setState('diffing');
      const fresh = this.diff(candidates);
      report.new = fresh.length;

      this.setState('delivering');
      for (const listing of fresh) {
        if (signal?.aborted) {
          report.cancelled = true;
          break;
        }

        const outcome = await dispatcher.deliver(listing, signal);
        if (outcome.status === 'cancelled') {
          report.cancelled = true;
          break;
        }

        if (outcome.status === 'delivered') {
          report.delivered++;
        } else {
          report.abandoned++;
        }

        try {
          await store.markSeen(listing.source_id, listing.listing_id, outcome.status);
        } catch (err) {
          if (!(err instanceof StoreError)) throw err;
          // The store keeps the record pending and answers hasSeen() for it.
          report.storeFailed++;
          logger.error(
            { source: source.name, listing: listing.listing_id, error: err.message },
            'Failed to persist seen record',
          );
        }
      }

      return this.finish(report, started);
    } finally {
      this.setState('idle');
    }
  }

  /**
   * Record every listing currently on the source as seen without notifying.
   */
  async seed(signal?: AbortSignal): Promise<SeedReport> {
    const { source, adapter, store } = this.deps;
    const candidates = await adapter.fetch(source, signal);
    const fresh = this.diff(candidates);
    for (const listing of fresh) {
      await store.markSeen(listing.source_id, listing.listing_id, 'seeded');
    }
    logger.info(
      { source: source.name, fetched: candidates.length, seeded: fresh.length },
      'Source seeded',
    );
    return { source: source.name, fetched: candidates.length, seeded: fresh.length };
  }

  // New listings in adapter order; repeats within one fetch collapse to the first.
  private diff(candidates: Listing[]): Listing[] {
    const { source, store } = this.deps;
    const inCycle = new Set<string>();
    const fresh: Listing[] = [];

    for (const candidate of candidates) {
      const listing: Listing = { ...candidate, source_id: source.name };
      if (!listing.listing_id) {
        logger.warn({ source: source.name, url: listing.url }, 'Skipping listing without an id');
        continue;
      }
      if (inCycle.has(listing.listing_id)) continue;
      inCycle.add(listing.listing_id);

      if (!store.hasSeen(listing.source_id, listing.listing_id)) {
        fresh.push(listing);
      }
    }
    return fresh;
  }

  private finish(report: CycleReport, started: number): CycleReport {
    report.durationMs = Date.now() - started;
    if (report.fetchFailed > 0) {
      logger.warn(report, 'Source cycle fetch failed');
    } else if (report.new > 0 || report.storeFailed > 0) {
      logger.info(report, 'Source cycle complete');
    } else {
      logger.debug(report, 'Source cycle complete');
    }
    return report;
  }
}
