import type { FastifyPluginAsync } from 'fastify';
import {
  WebhookValidationError,
  extractSignatureHeader,
  extractTextMessages,
  isLineWebhookPayload,
  validateWebhookSignature,
} from '@taskrelay/line';
import { enqueueInboundMessage, type MessageJobSink } from '@taskrelay/queue';

/**
 * LINE webhook configuration
 */
export interface LineWebhookConfig {
  channelSecret: string;
  skipValidation: boolean;
  messageQueue: MessageJobSink;
}

/**
 * LINE webhook routes
 *
 * Must answer quickly; routing and replies happen in the worker.
 */
export function createLineWebhook(config: LineWebhookConfig): FastifyPluginAsync {
  return async (fastify) => {
    // Keep the raw bytes: the signature covers the body exactly as sent
    fastify.addContentTypeParser('application/json', { parseAs: 'buffer' }, (_req, body, done) => {
      done(null, body);
    });

    /**
     * POST /webhooks/line
     */
    fastify.post<{ Body: Buffer }>('/', async (request, reply) => {
      const rawBody = request.body;

      if (!config.skipValidation) {
        try {
          validateWebhookSignature(rawBody, extractSignatureHeader(request.headers), config.channelSecret);
        } catch (error) {
          if (error instanceof WebhookValidationError) {
            request.log.warn({ error: error.message }, 'Webhook validation failed');
            return reply.status(401).send({ error: 'Unauthorized', message: error.message });
          }
          throw error;
        }
      } else {
        request.log.debug('Webhook signature validation skipped');
      }

      let payload: unknown;
      try {
        payload = JSON.parse(rawBody.toString('utf8'));
      } catch {
        return reply.status(400).send({ error: 'Bad Request', message: 'Body is not valid JSON' });
      }
      if (!isLineWebhookPayload(payload)) {
        return reply.status(400).send({ error: 'Bad Request', message: 'Not a LINE webhook payload' });
      }

      const messages = extractTextMessages(payload.events);
      request.log.info(
        { events: payload.events.length, textMessages: messages.length },
        '📨 INBOUND WEBHOOK RECEIVED'
      );

      try {
        for (const message of messages) {
          const jobId = await enqueueInboundMessage(config.messageQueue, {
            webhookEventId: message.webhookEventId,
            chatIdentity: message.chatIdentity,
            text: message.text,
            receivedAt: new Date(message.timestamp).toISOString(),
          });
          request.log.info(
            { jobId, chatIdentity: message.chatIdentity, isRedelivery: message.isRedelivery },
            'Message enqueued for processing'
          );
        }
      } catch (error) {
        request.log.error(
          { errorMessage: error instanceof Error ? error.message : String(error) },
          'Failed to enqueue message'
        );
        // LINE redelivers on 5xx; job ids keep that idempotent
        return reply.status(503).send({ received: true, queued: false });
      }

      return reply.status(200).send({ received: true, queued: messages.length });
    });
  };
}
