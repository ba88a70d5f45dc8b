import { z } from 'zod';
import type { Config } from '../shared/config.js';
import { DeliveryError, errorMessage, isAbortError } from '../shared/errors.js';
import { abortable } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import type { NotificationChannel, PushMessage } from './channel.js';

// Pushover caps: message 1024, title 250, url 512, url_title 100 characters.
const MAX_MESSAGE = 1024;
const MAX_TITLE = 250;
const MAX_URL = 512;
const MAX_URL_TITLE = 100;

const responseSchema = z.object({
  status: z.number(),
  request: z.string().optional(),
  errors: z.array(z.string()).optional(),
});

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 1)}…` : value;
}

export class PushoverChannel implements NotificationChannel {
  readonly name = 'pushover';

  constructor(private readonly config: Config['notify']['pushover']) {}

  async send(message: PushMessage): Promise<void> {
    const endpoint = `${this.config.api_base.replace(/\/+$/, '')}/messages.json`;

    const form = new URLSearchParams({
      token: this.config.app_token,
      user: this.config.user_key,
      message: truncate(message.body, MAX_MESSAGE),
      title: truncate(message.title, MAX_TITLE),
    });
    if (message.url && message.url.length <= MAX_URL) {
      form.set('url', message.url);
      if (message.urlTitle) form.set('url_title', truncate(message.urlTitle, MAX_URL_TITLE));
    }
    if (this.config.device) form.set('device', this.config.device);
    if (this.config.priority !== undefined) form.set('priority', String(this.config.priority));

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeout_ms);

    let response: Response;
    let text: string;
    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: form.toString(),
        signal: controller.signal,
      });
      // The timeout also covers a body that stalls after the headers.
      text = await abortable(response.text(), controller.signal);
    } catch (err) {
      if (isAbortError(err)) {
        throw new DeliveryError(
          `Pushover request timed out after ${this.config.timeout_ms}ms`,
          'transient',
        );
      }
      throw new DeliveryError(`Pushover request failed: ${errorMessage(err)}`, 'transient');
    } finally {
      clearTimeout(timer);
    }

    const parsed = responseSchema.safeParse(safeJson(text));
    const errors = parsed.success ? (parsed.data.errors ?? []) : [];

    if (response.status === 429) {
      throw new DeliveryError('Pushover rate limit reached', 'transient', { status: 429 });
    }
    if (response.status >= 400 && response.status < 500) {
      throw new DeliveryError(
        `Pushover rejected the message: ${errors.join('; ') || response.statusText}`,
        'rejected',
        { status: response.status, errors },
      );
    }
    if (!response.ok) {
      throw new DeliveryError(`Pushover API error: ${response.status}`, 'transient', {
        status: response.status,
        body: text.slice(0, 200),
      });
    }
    if (!parsed.success || parsed.data.status !== 1) {
      throw new DeliveryError('Pushover returned an unexpected response', 'transient', {
        status: response.status,
        body: text.slice(0, 200),
      });
    }

    logger.debug({ request: parsed.data.request }, 'Pushover message accepted');
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
