import type { Logger } from 'pino';

/**
 * Cron registration, node-cron's schedule() in production
 */
export type ScheduleFn = (expression: string, task: () => Promise<void>) => { stop(): unknown };

export interface ScheduledJob {
  name: string;
  expression: string;
  run: () => Promise<unknown>;
}

/**
 * Register each job; a failing run is logged and the schedule continues
 */
export function scheduleJobs(schedule: ScheduleFn, jobs: ScheduledJob[], logger: Logger): Array<{ stop(): unknown }> {
  return jobs.map((job) => {
    const task = schedule(job.expression, async () => {
      try {
        await job.run();
      } catch (error) {
        logger.error(
          { job: job.name, error: error instanceof Error ? error.message : String(error) },
          'Scheduled job failed'
        );
      }
    });
    logger.info({ job: job.name, expression: job.expression }, 'Job scheduled');
    return task;
  });
}
