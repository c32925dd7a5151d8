import { ConfigError } from '@taskrelay/config';
import { closeDbClient, createDbClient, pingDatabase } from '@taskrelay/database';
import { createMessageQueue, createRedisConnection } from '@taskrelay/queue';
import { buildServer } from './app.js';
import { loadConfig } from './config.js';

/**
 * taskrelay API Server
 *
 * Handles:
 * - LINE webhook for incoming chat messages
 * - Health checks
 */
async function main() {
  const config = loadConfig();

  const db = createDbClient(config.databaseUrl);
  const redis = createRedisConnection(config.redisUrl);
  const messageQueue = createMessageQueue(redis);

  const fastify = await buildServer(config, {
    messageQueue,
    readinessChecks: {
      database: () => pingDatabase(db),
      redis: () => redis.ping(),
    },
  });
  fastify.log.info('Database client, Redis and message queue initialized');

  const shutdown = async () => {
    fastify.log.info('Shutting down...');
    await fastify.close();
    await messageQueue.close();
    await redis.quit();
    await closeDbClient(db);
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});
