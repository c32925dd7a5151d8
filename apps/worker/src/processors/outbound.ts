import type { Logger } from 'pino';
import type { Notifier } from '@taskrelay/relay';
import type { OutboundMessageJobData } from '@taskrelay/queue';

export interface OutboundProcessorDeps {
  notifier: Notifier;
  logger: Logger;
}

/**
 * Outbound Message Processor
 *
 * Pushes one reply through the chat platform. A delivery failure is
 * rethrown so BullMQ retries the job.
 */
export function createOutboundProcessor(deps: OutboundProcessorDeps) {
  return async (data: OutboundMessageJobData) => {
    const { chatIdentity, content } = data;

    try {
      await deps.notifier.sendMessage(chatIdentity, content);
    } catch (error) {
      deps.logger.warn(
        { chatIdentity, inReplyTo: data.inReplyTo, error: error instanceof Error ? error.message : String(error) },
        'Outbound delivery failed'
      );
      throw error;
    }

    deps.logger.info({ chatIdentity, inReplyTo: data.inReplyTo, length: content.length }, '📤 OUTBOUND MESSAGE SENT');
    return { success: true };
  };
}
