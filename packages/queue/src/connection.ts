import { Redis } from 'ioredis';
import type { Logger } from 'pino';

/**
 * Create a Redis connection for BullMQ
 *
 * BullMQ requires specific Redis configuration:
 * - maxRetriesPerRequest: null (required for workers)
 * - enableReadyCheck: false (faster connection)
 *
 * @param redisUrl - Redis connection URL
 * @returns Redis client instance
 */
export function createRedisConnection(redisUrl: string, logger?: Logger): Redis {
  const redis = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
    retryStrategy: (times) => {
      // Exponential backoff with max 2 second delay
      return Math.min(times * 50, 2000);
    },
  });

  redis.on('error', (err: Error) => {
    logger?.error({ error: err.message }, 'Redis connection error');
  });

  redis.on('connect', () => {
    logger?.info('Redis connected');
  });

  return redis;
}
