import type { Logger } from 'pino';
import type { CommandRouter } from '@taskrelay/relay';
import { enqueueOutboundMessage, type InboundMessageJobData, type MessageJobSink } from '@taskrelay/queue';

export interface InboundProcessorDeps {
  router: CommandRouter;
  queue: MessageJobSink;
  logger: Logger;
}

/**
 * Inbound Message Processor
 *
 * Runs the command router on one chat message and queues each reply as
 * its own outbound job, in order.
 */
export function createInboundProcessor(deps: InboundProcessorDeps) {
  return async (data: InboundMessageJobData) => {
    const { webhookEventId, chatIdentity, text } = data;
    const log = deps.logger.child({ webhookEventId, chatIdentity });

    log.info({ text: text.slice(0, 100) }, '📥 INBOUND MESSAGE');

    const replies = await deps.router({ chatIdentity, text });

    for (const [sequence, content] of replies.entries()) {
      await enqueueOutboundMessage(deps.queue, { chatIdentity, content, inReplyTo: webhookEventId }, sequence);
    }

    log.info({ replies: replies.length }, 'Replies queued');
    return { replies: replies.length };
  };
}
