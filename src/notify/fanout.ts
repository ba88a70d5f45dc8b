import { DeliveryError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { NotificationChannel, PushMessage } from './channel.js';

interface ChannelFailure {
  channel: string;
  error: DeliveryError;
}

function asDeliveryError(err: unknown): DeliveryError {
  return err instanceof DeliveryError ? err : new DeliveryError(errorMessage(err), 'transient');
}

/**
 * Sends each message through every configured channel.
 *
 * A channel that accepted a message is skipped when the same message is sent
 * again on retry. The combined result is transient if any channel failed
 * transiently, rejected if every remaining channel rejected and none ever
 * accepted, and success otherwise.
 */
export class FanoutChannel implements NotificationChannel {
  readonly name: string;
  private readonly accepted = new WeakMap<PushMessage, Set<string>>();

  constructor(private readonly channels: NotificationChannel[]) {
    this.name = channels.map((c) => c.name).join('+');
  }

  async send(message: PushMessage): Promise<void> {
    const accepted = this.acceptedFor(message);
    const pending = this.channels.filter((c) => !accepted.has(c.name));

    const results = await Promise.all(
      pending.map(async (channel): Promise<ChannelFailure | null> => {
        try {
          await channel.send(message);
          accepted.add(channel.name);
          return null;
        } catch (err) {
          return { channel: channel.name, error: asDeliveryError(err) };
        }
      }),
    );
    const failures = results.filter((f): f is ChannelFailure => f !== null);
    if (failures.length === 0) return;

    const summary = failures.map((f) => `${f.channel}: ${f.error.message}`).join('; ');
    const details = { failed: failures.map((f) => f.channel), accepted: [...accepted] };

    if (failures.some((f) => f.error.kind === 'transient')) {
      throw new DeliveryError(summary, 'transient', details);
    }
    if (accepted.size === 0) {
      throw new DeliveryError(summary, 'rejected', details);
    }
    logger.warn({ ...details, error: summary }, 'Some channels rejected the message');
  }

  private acceptedFor(message: PushMessage): Set<string> {
    let accepted = this.accepted.get(message);
    if (!accepted) {
      accepted = new Set();
      this.accepted.set(message, accepted);
    }
    return accepted;
  }
}
