import { Worker, type Job } from 'bullmq';
import { GeminiClient } from '@taskrelay/ai';
import { ConfigError, createLogger } from '@taskrelay/config';
import { DrizzleAccountLinkRepository, closeDbClient, createDbClient } from '@taskrelay/database';
import { LineClient, LineNotifier } from '@taskrelay/line';
import { QUEUE_NAMES, createMessageQueue, createRedisConnection, type MessageJobData } from '@taskrelay/queue';
import { AccountLinkStore, createCommandRouter } from '@taskrelay/relay';
import { TrelloClient, TrelloTaskSource } from '@taskrelay/trello';
import { loadConfig } from './config.js';
import { createInboundProcessor, createOutboundProcessor, processMessageJob } from './processors/index.js';

/**
 * taskrelay Worker
 *
 * Processes background jobs:
 * - Inbound chat messages (command router)
 * - Outbound replies (LINE push)
 */
async function main() {
  const config = loadConfig();
  const logger = createLogger('worker', config);

  logger.info('Starting taskrelay message worker...');

  const db = createDbClient(config.databaseUrl);
  const redis = createRedisConnection(config.redisUrl, logger);
  const messageQueue = createMessageQueue(redis);

  const links = new AccountLinkStore(new DrizzleAccountLinkRepository(db));
  const tasks = new TrelloTaskSource(
    new TrelloClient({
      apiKey: config.trello.apiKey,
      apiToken: config.trello.apiToken,
      timeoutMs: config.upstreamTimeoutMs,
    }),
    {
      defaultListId: config.trello.defaultListId,
      inProgressLists: config.trello.inProgressLists,
      logger,
    }
  );
  const completion = GeminiClient.fromConfig({
    apiKey: config.gemini.apiKey,
    model: config.gemini.model,
    timeoutMs: config.upstreamTimeoutMs,
    logger,
  });
  const notifier = new LineNotifier(
    new LineClient({ channelAccessToken: config.lineChannelAccessToken, timeoutMs: config.upstreamTimeoutMs })
  );

  const router = createCommandRouter({
    links,
    tasks,
    completion,
    logger,
    grammar: config.grammar,
    zone: config.timezone,
  });

  const processors = {
    inbound: createInboundProcessor({ router, queue: messageQueue, logger }),
    outbound: createOutboundProcessor({ notifier, logger }),
  };

  const worker = new Worker<MessageJobData>(
    QUEUE_NAMES.MESSAGES,
    async (job: Job<MessageJobData>) => {
      logger.debug({ jobId: job.id, type: job.data.type }, 'Processing job');
      return processMessageJob(processors, job.data);
    },
    {
      connection: redis,
      concurrency: config.concurrency,
    }
  );

  worker.on('completed', (job: Job<MessageJobData>) => {
    logger.debug({ jobId: job.id }, 'Job completed');
  });

  worker.on('failed', (job: Job<MessageJobData> | undefined, error: Error) => {
    logger.error({ jobId: job?.id, attemptsMade: job?.attemptsMade, error: error.message }, 'Job failed');
  });

  worker.on('error', (error: Error) => {
    logger.error({ error: error.message }, 'Worker error');
  });

  logger.info({ queue: QUEUE_NAMES.MESSAGES, concurrency: config.concurrency }, 'Listening for jobs');

  const shutdown = async () => {
    logger.info('Shutting down...');
    await worker.close();
    await messageQueue.close();
    await redis.quit();
    await closeDbClient(db);
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('[Worker] Fatal error:', error);
  }
  process.exit(1);
});
