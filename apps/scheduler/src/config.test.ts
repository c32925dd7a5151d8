import { describe, expect, it } from 'vitest';
import { ConfigError } from '@taskrelay/config';
import { loadConfig } from './config.js';

const base = {
  DATABASE_URL: 'postgres://localhost/taskrelay',
  LINE_CHANNEL_ACCESS_TOKEN: 'test-token',
  TRELLO_API_KEY: 'test-key',
  TRELLO_API_TOKEN: 'test-token',
};

describe('loadConfig', () => {
  it('applies the reminder defaults', () => {
    expect(loadConfig(base)).toMatchObject({
      scanCron: '*/30 * * * *',
      horizonHours: 24,
      graceMinutes: 60,
      retentionDays: 7,
      timezone: 'UTC',
      upstreamTimeoutMs: 10_000,
      trello: { inProgressLists: ['doing', 'in progress'] },
    });
  });

  it('accepts a custom cadence', () => {
    expect(loadConfig({ ...base, REMINDER_SCAN_CRON: '*/5 * * * *' }).scanCron).toBe('*/5 * * * *');
  });

  it('rejects an invalid cron expression', () => {
    expect(() => loadConfig({ ...base, REMINDER_SCAN_CRON: 'every minute' })).toThrow(ConfigError);
  });

  it('rejects a non-positive horizon', () => {
    expect(() => loadConfig({ ...base, REMINDER_HORIZON_HOURS: '-1' })).toThrow(
      'REMINDER_HORIZON_HOURS must be a positive integer, got "-1"'
    );
  });
});
