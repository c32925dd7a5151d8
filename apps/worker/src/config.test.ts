import { describe, expect, it } from 'vitest';
import { ConfigError } from '@taskrelay/config';
import { loadConfig } from './config.js';

const base = {
  DATABASE_URL: 'postgres://localhost/taskrelay',
  REDIS_URL: 'redis://localhost:6379',
  LINE_CHANNEL_ACCESS_TOKEN: 'test-token',
  TRELLO_API_KEY: 'test-key',
  TRELLO_API_TOKEN: 'test-token',
  TRELLO_DEFAULT_LIST_ID: 'list-inbox',
  GOOGLE_AI_API_KEY: 'test-key',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(base);

    expect(config.trello.inProgressLists).toEqual(['doing', 'in progress']);
    expect(config.gemini.model).toBe('gemini-2.5-flash');
    expect(config.upstreamTimeoutMs).toBe(10_000);
    expect(config.concurrency).toBe(5);
    expect(config.grammar).toEqual({ bindPrefix: 'bind', statusKeywords: ['status', 'progress'] });
    expect(config.timezone).toBe('UTC');
  });

  it('reads the command grammar and zone', () => {
    const config = loadConfig({
      ...base,
      BIND_PREFIX: ' link ',
      STATUS_KEYWORDS: 'todo, tasks',
      TIMEZONE: 'Asia/Taipei',
    });

    expect(config.grammar).toEqual({ bindPrefix: 'link', statusKeywords: ['todo', 'tasks'] });
    expect(config.timezone).toBe('Asia/Taipei');
  });

  it('names a missing credential', () => {
    expect(() => loadConfig({ ...base, TRELLO_DEFAULT_LIST_ID: undefined })).toThrow(
      new ConfigError('Missing required environment variable: TRELLO_DEFAULT_LIST_ID')
    );
  });
});
