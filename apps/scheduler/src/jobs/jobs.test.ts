import { beforeEach, describe, expect, it } from 'vitest';
import pino from 'pino';
import {
  AccountLinkStore,
  InMemoryAccountLinkRepository,
  InMemoryReminderLedger,
  ReminderScanner,
} from '@taskrelay/relay';
import { FakeNotifier, FakeTaskSource } from '@taskrelay/relay/testing';
import { runLedgerPrune } from './ledger-prune.js';
import { runReminderScan } from './reminder-scan.js';

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;
const now = new Date('2026-10-18T09:00:00Z');
const logger = pino({ level: 'silent' });

describe('runReminderScan', () => {
  let ledger: InMemoryReminderLedger;
  let tasks: FakeTaskSource;
  let notifier: FakeNotifier;
  let scanner: ReminderScanner;

  beforeEach(async () => {
    const links = new AccountLinkStore(new InMemoryAccountLinkRepository(), () => now);
    await links.bind('U1', 'trello@member123');
    ledger = new InMemoryReminderLedger();
    tasks = new FakeTaskSource();
    notifier = new FakeNotifier();
    scanner = new ReminderScanner({ links, ledger, tasks, notifier, logger, clock: () => now });
  });

  it('reminds once per due window across ticks', async () => {
    tasks.setTasks('trello@member123', [
      { id: 'T1', title: 'Submit report', dueAt: new Date(now.getTime() + 2 * HOUR), status: 'open' },
    ]);

    const first = await runReminderScan(scanner, logger);
    const second = await runReminderScan(scanner, logger);

    expect(first).toEqual({ accounts: 1, skippedAccounts: 0, eligibleTasks: 1, remindersSent: 1, failedTasks: 0 });
    expect(second).toEqual({ accounts: 1, skippedAccounts: 0, eligibleTasks: 1, remindersSent: 0, failedTasks: 0 });
    expect(notifier.sent.map((message) => message.chatIdentity)).toEqual(['U1']);
    expect(ledger.size).toBe(1);
  });
});

describe('runLedgerPrune', () => {
  it('removes records past the retention period', async () => {
    const ledger = new InMemoryReminderLedger();
    const claim = (taskId: string, dueAt: Date) =>
      ledger.claim(
        { taskAccountId: 'trello@member123', taskId, dueWindowKey: `${taskId}-key` },
        { dueAt, now: dueAt, staleAfterMs: HOUR }
      );
    await claim('old', new Date(now.getTime() - 10 * DAY));
    await claim('recent', new Date(now.getTime() - DAY));

    await expect(runLedgerPrune(ledger, 7, logger, now)).resolves.toBe(1);
    expect(ledger.size).toBe(1);
    await expect(ledger.find({ taskAccountId: 'trello@member123', taskId: 'recent', dueWindowKey: 'recent-key' })).resolves.not.toBeNull();
  });
});
