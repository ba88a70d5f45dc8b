import type Database from 'better-sqlite3';
import { z } from 'zod';
import { openDb, sqliteCode, storeErrorFrom } from '../db/db.js';
import { migrateStore } from '../db/migrate.js';
import { StoreError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { createRetryPolicy, withRetry, type RetryPolicy } from '../shared/retry.js';
import { nowISO } from '../shared/utils.js';

export const SEEN_STATUSES = ['delivered', 'abandoned', 'seeded'] as const;
export type SeenStatus = (typeof SEEN_STATUSES)[number];

export interface SeenRecord {
  source_id: string;
  listing_id: string;
  status: SeenStatus;
  seen_at: string;
}

export type MarkResult = 'recorded' | 'unchanged';

/**
 * Durable "already notified" set, namespaced by source.
 */
export interface SeenStore {
  load(): Promise<void>;
  hasSeen(sourceId: string, listingId: string): boolean;
  markSeen(sourceId: string, listingId: string, status: SeenStatus): Promise<MarkResult>;
  flush(): Promise<void>;
}

export interface SeenStoreOptions {
  writeMaxAttempts?: number;
  writeBaseDelayMs?: number;
  writeMaxDelayMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface SeenStats {
  source_id: string;
  status: SeenStatus;
  count: number;
}

const SeenRowSchema = z.object({
  source_id: z.string().min(1),
  listing_id: z.string().min(1),
  status: z.enum(SEEN_STATUSES),
  seen_at: z.string().min(1),
});

function recordKey(sourceId: string, listingId: string): string {
  return `${sourceId}\u0000${listingId}`;
}

export class SqliteSeenStore implements SeenStore {
  private readonly seen = new Map<string, Map<string, SeenStatus>>();
  // Records whose durable write failed after every retry; retried before the next write.
  private readonly pending = new Map<string, SeenRecord>();
  private writeQueue: Promise<unknown> = Promise.resolve();
  private readonly retryPolicy: RetryPolicy;
  private loaded = false;

  constructor(
    private readonly db: Database.Database,
    private readonly options: SeenStoreOptions = {},
  ) {
    this.retryPolicy = createRetryPolicy({
      maxAttempts: options.writeMaxAttempts ?? 5,
      baseDelayMs: options.writeBaseDelayMs ?? 100,
      maxDelayMs: options.writeMaxDelayMs ?? 2000,
    });
  }

  async load(): Promise<void> {
    let rows: unknown[];
    try {
      migrateStore(this.db);
      const check: unknown = this.db.pragma('quick_check', { simple: true });
      if (check !== 'ok') {
        throw new StoreError('Seen store failed its integrity check', 'corrupt', { check });
      }
      rows = this.db
        .prepare('SELECT source_id, listing_id, status, seen_at FROM seen_listings')
        .all();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      throw storeErrorFrom('Failed to load seen store', err);
    }

    this.seen.clear();
    for (const row of rows) {
      const parsed = SeenRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new StoreError('Seen store contains an unreadable record', 'corrupt', {
          row,
          errors: parsed.error.flatten().fieldErrors,
        });
      }
      this.remember(parsed.data.source_id, parsed.data.listing_id, parsed.data.status);
    }

    this.loaded = true;
    logger.debug({ records: rows.length }, 'Seen store loaded');
  }

  hasSeen(sourceId: string, listingId: string): boolean {
    this.assertLoaded();
    return (
      this.seen.get(sourceId)?.has(listingId) === true ||
      this.pending.has(recordKey(sourceId, listingId))
    );
  }

  statusOf(sourceId: string, listingId: string): SeenStatus | undefined {
    return (
      this.seen.get(sourceId)?.get(listingId) ??
      this.pending.get(recordKey(sourceId, listingId))?.status
    );
  }

  /**
   * Record a terminal outcome. The first status recorded for a pair wins;
   * later calls are no-ops. Resolves only once the row is committed.
   */
  async markSeen(sourceId: string, listingId: string, status: SeenStatus): Promise<MarkResult> {
    this.assertLoaded();
    const existing = this.statusOf(sourceId, listingId);
    if (existing !== undefined) {
      if (existing !== status) {
        logger.warn(
          { source: sourceId, listing: listingId, existing, requested: status },
          'Listing already recorded with another status, keeping the first',
        );
      }
      return 'unchanged';
    }

    this.pending.set(recordKey(sourceId, listingId), {
      source_id: sourceId,
      listing_id: listingId,
      status,
      seen_at: nowISO(),
    });

    return this.enqueue(async () => {
      await this.writePending();
      return 'recorded' as const;
    });
  }

  async flush(): Promise<void> {
    if (this.pending.size === 0) return;
    await this.enqueue(() => this.writePending());
  }

  pendingCount(): number {
    return this.pending.size;
  }

  stats(): SeenStats[] {
    return this.db
      .prepare(
        `SELECT source_id, status, COUNT(*) AS count
         FROM seen_listings GROUP BY source_id, status ORDER BY source_id, status`,
      )
      .all() as SeenStats[];
  }

  close(): void {
    this.db.close();
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new StoreError('Seen store used before load()', 'unavailable');
    }
  }

  private remember(sourceId: string, listingId: string, status: SeenStatus): void {
    let bySource = this.seen.get(sourceId);
    if (!bySource) {
      bySource = new Map();
      this.seen.set(sourceId, bySource);
    }
    bySource.set(listingId, status);
  }

  // Writes go through one queue so concurrent source loops never interleave commits.
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task, task);
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  private async writePending(): Promise<void> {
    for (const [key, record] of [...this.pending]) {
      try {
        await withRetry(async () => this.insert(record), this.retryPolicy, {
          sleep: this.options.sleep,
          onRetry: ({ attempt, delayMs, error }) => {
            logger.warn(
              {
                source: record.source_id,
                listing: record.listing_id,
                attempt,
                delayMs,
                error: errorMessage(error),
              },
              'Seen store write failed, retrying',
            );
          },
        });
      } catch (err) {
        throw new StoreError(`Failed to persist seen record: ${errorMessage(err)}`, 'unavailable', {
          source: record.source_id,
          listing: record.listing_id,
          sqliteCode: sqliteCode(err),
        });
      }
      this.pending.delete(key);
      this.remember(record.source_id, record.listing_id, record.status);
    }
  }

  private insert(record: SeenRecord): void {
    this.db
      .prepare(
        `INSERT INTO seen_listings (source_id, listing_id, status, seen_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(source_id, listing_id) DO NOTHING`,
      )
      .run(record.source_id, record.listing_id, record.status, record.seen_at);
  }
}

/**
 * Open (creating if needed) the store file without loading it. Open failures
 * are classified `corrupt` (not a database) or `unavailable`.
 */
export function createSeenStore(dbPath: string, options: SeenStoreOptions = {}): SqliteSeenStore {
  let db: Database.Database;
  try {
    db = openDb(dbPath);
  } catch (err) {
    throw storeErrorFrom(`Cannot open seen store at ${dbPath}`, err, { path: dbPath });
  }
  return new SqliteSeenStore(db, options);
}

export async function openSeenStore(
  dbPath: string,
  options: SeenStoreOptions = {},
): Promise<SqliteSeenStore> {
  const store = createSeenStore(dbPath, options);
  try {
    await store.load();
  } catch (err) {
    store.close();
    throw err;
  }
  return store;
}
