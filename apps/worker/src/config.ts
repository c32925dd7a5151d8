import {
  intEnv,
  listEnv,
  loggingEnv,
  requireEnv,
  stringEnv,
  zoneEnv,
  type Env,
  type LoggingConfig,
} from '@taskrelay/config';
import { DEFAULT_GRAMMAR, type CommandGrammar } from '@taskrelay/relay';
import { DEFAULT_IN_PROGRESS_LISTS } from '@taskrelay/trello';

export interface WorkerConfig extends LoggingConfig {
  databaseUrl: string;
  redisUrl: string;
  lineChannelAccessToken: string;
  trello: {
    apiKey: string;
    apiToken: string;
    defaultListId: string;
    inProgressLists: string[];
  };
  gemini: {
    apiKey: string;
    model: string;
  };
  upstreamTimeoutMs: number;
  concurrency: number;
  grammar: CommandGrammar;
  timezone: string;
}

export function loadConfig(env: Env = process.env): WorkerConfig {
  return {
    databaseUrl: requireEnv(env, 'DATABASE_URL'),
    redisUrl: requireEnv(env, 'REDIS_URL'),
    lineChannelAccessToken: requireEnv(env, 'LINE_CHANNEL_ACCESS_TOKEN'),
    trello: {
      apiKey: requireEnv(env, 'TRELLO_API_KEY'),
      apiToken: requireEnv(env, 'TRELLO_API_TOKEN'),
      defaultListId: requireEnv(env, 'TRELLO_DEFAULT_LIST_ID'),
      inProgressLists: listEnv(env, 'TRELLO_IN_PROGRESS_LISTS', DEFAULT_IN_PROGRESS_LISTS),
    },
    gemini: {
      apiKey: requireEnv(env, 'GOOGLE_AI_API_KEY'),
      model: stringEnv(env, 'GEMINI_MODEL', 'gemini-2.5-flash'),
    },
    upstreamTimeoutMs: intEnv(env, 'UPSTREAM_TIMEOUT_MS', 10_000),
    concurrency: intEnv(env, 'WORKER_CONCURRENCY', 5),
    grammar: {
      bindPrefix: stringEnv(env, 'BIND_PREFIX', DEFAULT_GRAMMAR.bindPrefix).trim(),
      statusKeywords: listEnv(env, 'STATUS_KEYWORDS', DEFAULT_GRAMMAR.statusKeywords),
    },
    timezone: zoneEnv(env, 'TIMEZONE', 'UTC'),
    ...loggingEnv(env),
  };
}
