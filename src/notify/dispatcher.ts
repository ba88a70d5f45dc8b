import { DeliveryError, errorMessage, isAbortError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { createRetryPolicy, withRetry, type RetryPolicy } from '../shared/retry.js';
import type { Listing } from '../source/adapter.js';
import type { NotificationChannel, PushMessage } from './channel.js';

export interface NotificationAttempt {
  attempt: number;
  at: string;
  outcome: 'ok' | 'transient' | 'rejected';
  error?: string;
}

/**
 * `delivered` and `abandoned` are terminal and get recorded as seen.
 * `cancelled` means shutdown interrupted the retry sequence; nothing was
 * delivered, so the listing stays unseen.
 */
export type DeliveryOutcome =
  | { status: 'delivered'; attempts: NotificationAttempt[] }
  | { status: 'abandoned'; reason: string; attempts: NotificationAttempt[] }
  | { status: 'cancelled'; attempts: NotificationAttempt[] };

export interface DispatcherOptions {
  channel: NotificationChannel;
  render: (listing: Listing) => PushMessage;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function isRejected(err: unknown): boolean {
  return err instanceof DeliveryError && err.kind === 'rejected';
}

export class NotificationDispatcher {
  private readonly policy: RetryPolicy;

  constructor(private readonly options: DispatcherOptions) {
    this.policy = createRetryPolicy({
      maxAttempts: options.maxAttempts,
      baseDelayMs: options.baseDelayMs,
      maxDelayMs: options.maxDelayMs,
      // Anything not explicitly rejected (including unexpected errors) is retried.
      isRetryable: (err) => !isRejected(err),
    });
  }

  /**
   * Deliver one listing. The shutdown `signal` cancels backoff waits and
   * further attempts but never an attempt already in flight.
   */
  async deliver(listing: Listing, signal?: AbortSignal): Promise<DeliveryOutcome> {
    const attempts: NotificationAttempt[] = [];
    if (signal?.aborted) {
      return { status: 'cancelled', attempts };
    }

    const { channel } = this.options;
    let message: PushMessage;
    try {
      message = this.options.render(listing);
    } catch (err) {
      // Rendering is deterministic, so a retry would fail the same way.
      const reason = `render failed: ${errorMessage(err)}`;
      logger.error(
        { source: listing.source_id, listing: listing.listing_id, channel: channel.name, reason },
        'Notification abandoned',
      );
      return { status: 'abandoned', reason, attempts };
    }

    try {
      await withRetry(
        async (attempt) => {
          const at = new Date().toISOString();
          try {
            await channel.send(message);
          } catch (err) {
            attempts.push({
              attempt,
              at,
              outcome: isRejected(err) ? 'rejected' : 'transient',
              error: errorMessage(err),
            });
            throw err;
          }
          attempts.push({ attempt, at, outcome: 'ok' });
        },
        this.policy,
        {
          signal,
          sleep: this.options.sleep,
          onRetry: ({ attempt, delayMs, error }) => {
            logger.warn(
              {
                source: listing.source_id,
                listing: listing.listing_id,
                channel: channel.name,
                attempt,
                delayMs,
                error: errorMessage(error),
              },
              'Notification attempt failed, retrying',
            );
          },
        },
      );
      return { status: 'delivered', attempts };
    } catch (err) {
      if (isAbortError(err)) {
        return { status: 'cancelled', attempts };
      }
      const reason = isRejected(err)
        ? `rejected: ${errorMessage(err)}`
        : `retries exhausted after ${attempts.length} attempts: ${errorMessage(err)}`;
      logger.error(
        { source: listing.source_id, listing: listing.listing_id, channel: channel.name, reason },
        'Notification abandoned',
      );
      return { status: 'abandoned', reason, attempts };
    }
  }
}
