import { logger } from '../shared/logger.js';
import type { NotificationChannel, PushMessage } from './channel.js';

/**
 * Dry-run channel: logs what would be sent and always succeeds.
 */
export class SimulatedChannel implements NotificationChannel {
  readonly name = 'simulate';

  async send(message: PushMessage): Promise<void> {
    const oneLine = message.body
      .split('\n')
      .map((line) => line.trim())
      .join(' | ');
    logger.info({ title: message.title, body: oneLine, url: message.url }, 'Simulated notification');
  }
}
