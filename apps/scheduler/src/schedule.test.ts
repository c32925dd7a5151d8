import { describe, expect, it, vi } from 'vitest';
import pino from 'pino';
import { scheduleJobs, type ScheduleFn } from './schedule.js';

const logger = pino({ level: 'silent' });

describe('scheduleJobs', () => {
  function fakeSchedule() {
    const registered: Array<{ expression: string; task: () => Promise<void> }> = [];
    const schedule: ScheduleFn = (expression, task) => {
      registered.push({ expression, task });
      return { stop: vi.fn() };
    };
    return { schedule, registered };
  }

  it('registers every job under its expression', async () => {
    const { schedule, registered } = fakeSchedule();
    const scan = vi.fn(async () => 'scanned');
    const prune = vi.fn(async () => 3);

    const tasks = scheduleJobs(
      schedule,
      [
        { name: 'reminder-scan', expression: '*/30 * * * *', run: scan },
        { name: 'ledger-prune', expression: '0 3 * * *', run: prune },
      ],
      logger
    );

    expect(tasks).toHaveLength(2);
    expect(registered.map((entry) => entry.expression)).toEqual(['*/30 * * * *', '0 3 * * *']);

    await registered[0]?.task();
    expect(scan).toHaveBeenCalledTimes(1);
    expect(prune).not.toHaveBeenCalled();
  });

  it('logs a failing run instead of throwing', async () => {
    const { schedule, registered } = fakeSchedule();
    const errorSpy = vi.spyOn(logger, 'error');

    scheduleJobs(
      schedule,
      [
        {
          name: 'reminder-scan',
          expression: '* * * * *',
          run: async () => {
            throw new Error('database down');
          },
        },
      ],
      logger
    );

    await expect(registered[0]?.task()).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith({ job: 'reminder-scan', error: 'database down' }, 'Scheduled job failed');
  });
});
