import { describe, it, expect } from 'vitest';
import { FanoutChannel } from '../fanout.js';
import type { NotificationChannel, PushMessage } from '../channel.js';
import { DeliveryError } from '../../shared/errors.js';

type Outcome = 'ok' | 'transient' | 'rejected';

function stubChannel(name: string, outcomes: Outcome[]) {
  const sent: PushMessage[] = [];
  const channel: NotificationChannel = {
    name,
    async send(message) {
      sent.push(message);
      const outcome = outcomes.shift() ?? 'ok';
      if (outcome !== 'ok') {
        throw new DeliveryError(`${name} ${outcome}`, outcome);
      }
    },
  };
  return { channel, sent };
}

const MESSAGE: PushMessage = { title: 'New listing on flats', body: 'Loft\n900 EUR' };

describe('FanoutChannel', () => {
  it('sends to every channel', async () => {
    const a = stubChannel('pushover', []);
    const b = stubChannel('email', []);
    const fanout = new FanoutChannel([a.channel, b.channel]);

    expect(fanout.name).toBe('pushover+email');
    await fanout.send(MESSAGE);
    expect(a.sent).toEqual([MESSAGE]);
    expect(b.sent).toEqual([MESSAGE]);
  });

  it('is transient when any channel fails transiently', async () => {
    const a = stubChannel('pushover', ['transient']);
    const b = stubChannel('email', ['rejected']);
    const fanout = new FanoutChannel([a.channel, b.channel]);

    const err = await fanout.send(MESSAGE).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DeliveryError);
    if (err instanceof DeliveryError) {
      expect(err.kind).toBe('transient');
      expect(err.message).toBe('pushover: pushover transient; email: email rejected');
    }
  });

  it('skips channels that already accepted when the message is retried', async () => {
    const a = stubChannel('pushover', []);
    const b = stubChannel('email', ['transient']);
    const fanout = new FanoutChannel([a.channel, b.channel]);

    await expect(fanout.send(MESSAGE)).rejects.toThrow('email: email transient');
    await fanout.send(MESSAGE);

    expect(a.sent).toHaveLength(1);
    expect(b.sent).toHaveLength(2);
  });

  it('succeeds when the only failures are rejections and another channel accepted', async () => {
    const a = stubChannel('pushover', []);
    const b = stubChannel('email', ['rejected']);
    const fanout = new FanoutChannel([a.channel, b.channel]);

    await expect(fanout.send(MESSAGE)).resolves.toBeUndefined();
  });

  it('is rejected only when every channel rejects', async () => {
    const a = stubChannel('pushover', ['rejected']);
    const b = stubChannel('email', ['rejected']);
    const fanout = new FanoutChannel([a.channel, b.channel]);

    const err = await fanout.send(MESSAGE).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DeliveryError);
    if (err instanceof DeliveryError) {
      expect(err.kind).toBe('rejected');
    }
  });

  it('treats an unexpected error as transient', async () => {
    const broken: NotificationChannel = {
      name: 'broken',
      send: async () => {
        throw new Error('socket closed');
      },
    };
    const fanout = new FanoutChannel([broken, stubChannel('email', []).channel]);

    const err = await fanout.send(MESSAGE).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DeliveryError);
    if (err instanceof DeliveryError) {
      expect(err.kind).toBe('transient');
      expect(err.message).toBe('broken: socket closed');
    }
  });
});
