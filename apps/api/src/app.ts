import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { MessageJobSink } from '@taskrelay/queue';
import type { ApiConfig } from './config.js';
import { healthRoutes, type ReadinessChecks } from './routes/health.js';
import { createLineWebhook } from './routes/webhooks/line.js';

export interface ServerDeps {
  messageQueue: MessageJobSink;
  readinessChecks: ReadinessChecks;
}

/**
 * Build the Fastify instance with all routes registered
 */
export async function buildServer(
  config: Pick<ApiConfig, 'lineChannelSecret' | 'skipWebhookValidation' | 'logLevel' | 'prettyLogs'>,
  deps: ServerDeps
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      transport: config.prettyLogs ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
    },
  });

  await fastify.register(cors, {
    origin: true,
  });

  await fastify.register(healthRoutes, { prefix: '/health', checks: deps.readinessChecks });

  await fastify.register(
    createLineWebhook({
      channelSecret: config.lineChannelSecret,
      skipValidation: config.skipWebhookValidation,
      messageQueue: deps.messageQueue,
    }),
    { prefix: '/webhooks/line' }
  );

  return fastify;
}
