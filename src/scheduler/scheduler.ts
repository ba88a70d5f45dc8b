/**
 * Scheduler: one independent polling loop per source, interval + jitter,
 * fault isolation at the loop boundary, and graceful shutdown.
 */

import { errorMessage, isAbortError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep as defaultSleep } from '../shared/utils.js';
import type { SeenStore } from '../store/seenStore.js';
import type { CycleReport, LoopState, SourceWorker } from '../worker/sourceWorker.js';

export interface SchedulerOptions {
  store: SeenStore;
  workers: SourceWorker[];
  onReport?: (report: CycleReport) => void;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class Scheduler {
  private readonly controller = new AbortController();
  private loops: Promise<void>[] = [];
  private started = false;
  private stopping: Promise<void> | null = null;

  constructor(private readonly options: SchedulerOptions) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Load the store, then launch every source loop. The first cycle of each
   * source runs immediately; later cycles wait interval + jitter.
   */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    await this.options.store.load();
    // stop() during load wins
    if (this.controller.signal.aborted) return;

    this.loops = this.options.workers.map((worker) => this.runLoop(worker));
    logger.info({ sources: this.options.workers.map((w) => w.source.name) }, 'Scheduler started');
  }

  /**
   * Resolves once every loop has exited (after stop()).
   */
  async done(): Promise<void> {
    await Promise.all(this.loops);
  }

  /**
   * One cycle per source, concurrently, without looping. Faults are isolated
   * the same way as in the loops.
   */
  async runOnce(): Promise<CycleReport[]> {
    await this.options.store.load();
    const reports = await Promise.all(
      this.options.workers.map((worker) => this.runGuarded(worker)),
    );
    await this.options.store.flush();
    return reports.filter((r): r is CycleReport => r !== null);
  }

  async stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    await this.stopping;
  }

  states(): Record<string, LoopState> {
    const result: Record<string, LoopState> = {};
    for (const worker of this.options.workers) {
      result[worker.source.name] = worker.state;
    }
    return result;
  }

  private async shutdown(): Promise<void> {
    logger.info('Scheduler stopping');
    for (const worker of this.options.workers) {
      worker.setState('stopping');
    }
    this.controller.abort();

    await Promise.all(this.loops);
    try {
      await this.options.store.flush();
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Failed to flush pending seen records on shutdown');
    }
    logger.info('Scheduler stopped');
  }

  private async runLoop(worker: SourceWorker): Promise<void> {
    const { signal } = this.controller;
    const random = this.options.random ?? Math.random;
    const sleep = this.options.sleep ?? defaultSleep;
    const { poll_interval_ms: intervalMs, jitter_ms: jitterMs } = worker.source;

    while (!signal.aborted) {
      await this.runGuarded(worker);
      if (signal.aborted) break;

      const delay = intervalMs + Math.floor(random() * jitterMs);
      try {
        await sleep(delay, signal);
      } catch (err) {
        if (isAbortError(err)) break;
        throw err;
      }
    }

    worker.setState('stopped');
  }

  private async runGuarded(worker: SourceWorker): Promise<CycleReport | null> {
    try {
      const report = await worker.runCycle(this.controller.signal);
      this.options.onReport?.(report);
      return report;
    } catch (err) {
      logger.error(
        { source: worker.source.name, error: errorMessage(err), stack: err instanceof Error ? err.stack : undefined },
        'Source cycle fault',
      );
      return null;
    }
  }
}
