/**
 * Notifier Tests
 */

import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { NotificationError } from '../../../core/errors.js';
import {
  ConsoleNotifier,
  deliver,
  type NotificationMessage,
  type Notifier,
  type SendResult,
} from '../../../notify/notifier.js';

const message: NotificationMessage = {
  text: 'Parcel change summary\nAdded: 1',
  generatedAt: '2026-01-15T03:00:00.000Z',
};

describe('ConsoleNotifier', () => {
  it('writes the message text followed by a newline', async () => {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString('utf-8'));
        callback();
      },
    });

    const result = await new ConsoleNotifier(stream).send(message);

    expect(result).toEqual({ success: true, channel: 'console' });
    expect(chunks.join('')).toBe('Parcel change summary\nAdded: 1\n');
  });
});

describe('deliver', () => {
  it('wraps a thrown error', async () => {
    const failing: Notifier = {
      channel: 'broken',
      send: async (): Promise<SendResult> => {
        throw new Error('socket closed');
      },
    };

    await expect(deliver(failing, message)).rejects.toThrow(
      new NotificationError('broken', 'socket closed')
    );
  });

  it('rejects an unsuccessful result', async () => {
    const refusing: Notifier = {
      channel: 'chat',
      send: async () => ({ success: false, channel: 'chat' }),
    };

    await expect(deliver(refusing, message)).rejects.toThrow(
      'Notification via chat failed: rejected without a reason'
    );
  });
});
