import cron from 'node-cron';
import { ConfigError, createLogger } from '@taskrelay/config';
import {
  DrizzleAccountLinkRepository,
  DrizzleReminderLedger,
  closeDbClient,
  createDbClient,
} from '@taskrelay/database';
import { LineClient, LineNotifier } from '@taskrelay/line';
import { AccountLinkStore, ReminderScanner } from '@taskrelay/relay';
import { TrelloClient, TrelloTaskSource } from '@taskrelay/trello';
import { LEDGER_PRUNE_CRON, loadConfig } from './config.js';
import { runLedgerPrune } from './jobs/ledger-prune.js';
import { runReminderScan } from './jobs/reminder-scan.js';
import { scheduleJobs } from './schedule.js';

/**
 * taskrelay Scheduler
 *
 * Runs scheduled jobs for:
 * - Due-date reminders (scan linked accounts on a fixed cadence)
 * - Reminder ledger pruning (daily)
 */
async function main() {
  const config = loadConfig();
  const logger = createLogger('scheduler', config);

  logger.info('Starting taskrelay scheduler...');

  const db = createDbClient(config.databaseUrl);
  const ledger = new DrizzleReminderLedger(db);

  const scanner = new ReminderScanner(
    {
      links: new AccountLinkStore(new DrizzleAccountLinkRepository(db)),
      ledger,
      tasks: new TrelloTaskSource(
        new TrelloClient({
          apiKey: config.trello.apiKey,
          apiToken: config.trello.apiToken,
          timeoutMs: config.upstreamTimeoutMs,
        }),
        { inProgressLists: config.trello.inProgressLists, logger }
      ),
      notifier: new LineNotifier(
        new LineClient({ channelAccessToken: config.lineChannelAccessToken, timeoutMs: config.upstreamTimeoutMs })
      ),
      logger,
    },
    {
      horizonMs: config.horizonHours * 60 * 60 * 1000,
      graceMs: config.graceMinutes * 60 * 1000,
      zone: config.timezone,
    }
  );

  const tasks = scheduleJobs(
    cron.schedule,
    [
      { name: 'reminder-scan', expression: config.scanCron, run: () => runReminderScan(scanner, logger) },
      {
        name: 'ledger-prune',
        expression: LEDGER_PRUNE_CRON,
        run: () => runLedgerPrune(ledger, config.retentionDays, logger),
      },
    ],
    logger
  );

  logger.info('All jobs scheduled. Scheduler running...');

  const shutdown = async () => {
    logger.info('Shutting down...');
    for (const task of tasks) {
      task.stop();
    }
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
    console.error('[Scheduler] Fatal error:', error);
  }
  process.exit(1);
});
