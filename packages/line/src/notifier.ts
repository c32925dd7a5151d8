import { DeliveryFailedError, describeError, splitMessage, type Notifier } from '@taskrelay/relay';
import type { LineClient } from './client.js';

/**
 * Notifier over LINE push messages
 *
 * Long texts are split into chunks and sent in one push, five chunks at a
 * time. Any failure becomes a DeliveryFailedError.
 */
export class LineNotifier implements Notifier {
  constructor(private readonly client: LineClient) {}

  async sendMessage(chatIdentity: string, text: string): Promise<void> {
    const parts = splitMessage(text);

    try {
      for (let i = 0; i < parts.length; i += 5) {
        await this.client.pushText(chatIdentity, parts.slice(i, i + 5));
      }
    } catch (error) {
      throw new DeliveryFailedError(chatIdentity, describeError(error), { cause: error });
    }
  }
}
