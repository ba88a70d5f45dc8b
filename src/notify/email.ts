/**
 * Email channel: one plain-text + HTML mail per listing via nodemailer.
 * Used when notify.channels lists 'email'.
 */

import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { Config } from '../shared/config.js';
import { ConfigError, DeliveryError, errorMessage } from '../shared/errors.js';
import type { NotificationChannel, PushMessage } from './channel.js';

export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

// Malformed envelope/message and bad credentials do not improve with retries.
const REJECTED_CODES = new Set(['EENVELOPE', 'EMESSAGE', 'EAUTH']);

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function renderEmailHtml(message: PushMessage): string {
  const body = escapeHtml(message.body).replace(/\n/g, '<br>');
  const link = message.url
    ? `<p><a href="${escapeHtml(message.url)}">${escapeHtml(message.urlTitle ?? message.url)}</a></p>`
    : '';
  return `<h2>${escapeHtml(message.title)}</h2><p>${body}</p>${link}`;
}

/**
 * SMTP reply codes: 5xx is a permanent refusal, 4xx and connection faults
 * are worth another attempt.
 */
export function classifyMailError(err: unknown): DeliveryError {
  const responseCode =
    err instanceof Error && 'responseCode' in err && typeof err.responseCode === 'number'
      ? err.responseCode
      : undefined;
  const code = err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;

  const rejected =
    (responseCode !== undefined && responseCode >= 500) || (code !== undefined && REJECTED_CODES.has(code));

  return new DeliveryError(`Email send failed: ${errorMessage(err)}`, rejected ? 'rejected' : 'transient', {
    responseCode,
    code,
  });
}

export class EmailChannel implements NotificationChannel {
  readonly name = 'email';

  constructor(
    private readonly config: Config['notify']['email'],
    private readonly transport: MailTransport = nodemailer.createTransport({
      host: config.smtp_host,
      port: config.smtp_port,
      secure: config.smtp_port === 465,
      auth: config.smtp_user ? { user: config.smtp_user, pass: config.smtp_pass } : undefined,
    }),
  ) {
    if (config.to.length === 0) {
      throw new ConfigError('notify.email.to must list at least one recipient');
    }
  }

  async send(message: PushMessage): Promise<void> {
    const text = message.url ? `${message.body}\n\n${message.url}` : message.body;
    try {
      await this.transport.sendMail({
        from: this.config.from,
        to: this.config.to.join(', '),
        subject: message.title,
        text,
        html: renderEmailHtml(message),
      });
    } catch (err) {
      throw classifyMailError(err);
    }
  }
}
