import { ConfigError, loggingEnv, requireEnv, type Env, type LoggingConfig } from '@taskrelay/config';

/**
 * API server configuration, read from the environment at start-up
 */
export interface ApiConfig extends LoggingConfig {
  port: number;
  host: string;
  databaseUrl: string;
  redisUrl: string;
  lineChannelSecret: string;
  skipWebhookValidation: boolean;
}

export function loadConfig(env: Env = process.env): ApiConfig {
  const port = parseInt(env['PORT'] ?? '3000', 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`PORT must be a TCP port, got "${env['PORT']}"`);
  }

  return {
    port,
    host: env['HOST'] ?? '0.0.0.0',
    databaseUrl: requireEnv(env, 'DATABASE_URL'),
    redisUrl: requireEnv(env, 'REDIS_URL'),
    lineChannelSecret: requireEnv(env, 'LINE_CHANNEL_SECRET'),
    skipWebhookValidation: env['SKIP_WEBHOOK_VALIDATION'] === 'true',
    ...loggingEnv(env),
  };
}
