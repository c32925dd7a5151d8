import cron from 'node-cron';
import {
  ConfigError,
  intEnv,
  listEnv,
  loggingEnv,
  requireEnv,
  stringEnv,
  zoneEnv,
  type Env,
  type LoggingConfig,
} from '@taskrelay/config';
import { DEFAULT_IN_PROGRESS_LISTS } from '@taskrelay/trello';

/** Ledger pruning runs once a day */
export const LEDGER_PRUNE_CRON = '0 3 * * *';

export interface SchedulerConfig extends LoggingConfig {
  databaseUrl: string;
  lineChannelAccessToken: string;
  trello: {
    apiKey: string;
    apiToken: string;
    inProgressLists: string[];
  };
  upstreamTimeoutMs: number;
  timezone: string;
  scanCron: string;
  horizonHours: number;
  graceMinutes: number;
  retentionDays: number;
}

export function loadConfig(env: Env = process.env): SchedulerConfig {
  const scanCron = stringEnv(env, 'REMINDER_SCAN_CRON', '*/30 * * * *');
  if (!cron.validate(scanCron)) {
    throw new ConfigError(`REMINDER_SCAN_CRON is not a valid cron expression: "${scanCron}"`);
  }

  return {
    databaseUrl: requireEnv(env, 'DATABASE_URL'),
    lineChannelAccessToken: requireEnv(env, 'LINE_CHANNEL_ACCESS_TOKEN'),
    trello: {
      apiKey: requireEnv(env, 'TRELLO_API_KEY'),
      apiToken: requireEnv(env, 'TRELLO_API_TOKEN'),
      inProgressLists: listEnv(env, 'TRELLO_IN_PROGRESS_LISTS', DEFAULT_IN_PROGRESS_LISTS),
    },
    upstreamTimeoutMs: intEnv(env, 'UPSTREAM_TIMEOUT_MS', 10_000),
    timezone: zoneEnv(env, 'TIMEZONE', 'UTC'),
    scanCron,
    horizonHours: intEnv(env, 'REMINDER_HORIZON_HOURS', 24),
    graceMinutes: intEnv(env, 'REMINDER_GRACE_MINUTES', 60),
    retentionDays: intEnv(env, 'REMINDER_RETENTION_DAYS', 7),
    ...loggingEnv(env),
  };
}
