/**
 * Notifier boundary
 *
 * The run hands a rendered message to a Notifier once it has decided to
 * send. Chat-bot delivery lives outside this package; the console notifier
 * prints the message for log capture or for piping into another tool.
 */

import type { Writable } from 'node:stream';
import { NotificationError } from '../core/errors.js';

export interface NotificationMessage {
  readonly text: string;
  /** ISO timestamp of the run that produced the message */
  readonly generatedAt: string;
}

export interface SendResult {
  readonly success: boolean;
  readonly channel: string;
  readonly error?: string;
}

export interface Notifier {
  /** Channel name, used in logs and errors */
  readonly channel: string;
  send(message: NotificationMessage): Promise<SendResult>;
}

/**
 * Writes messages to a stream (stdout by default)
 */
export class ConsoleNotifier implements Notifier {
  readonly channel = 'console';

  constructor(private readonly stream: Writable = process.stdout) {}

  async send(message: NotificationMessage): Promise<SendResult> {
    await new Promise<void>((resolve, reject) => {
      this.stream.write(`${message.text}\n`, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
    return { success: true, channel: this.channel };
  }
}

/**
 * Send and convert a failed result or a thrown error into NotificationError
 */
export async function deliver(notifier: Notifier, message: NotificationMessage): Promise<SendResult> {
  let result: SendResult;
  try {
    result = await notifier.send(message);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new NotificationError(notifier.channel, reason, { cause: error });
  }

  if (!result.success) {
    throw new NotificationError(notifier.channel, result.error ?? 'rejected without a reason');
  }
  return result;
}
