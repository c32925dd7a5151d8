import type { Logger } from 'pino';
import type { BoardTask, ChatIdentity, ReminderKey, TaskAccountId } from '@taskrelay/shared-types';
import type { Notifier, ReminderLedger, TaskSource } from '../ports.js';
import type { AccountLinkStore } from '../links/store.js';
import { describeError } from '../errors.js';
import { formatReminder } from '../formatters/line.js';
import { isReminderDue, reminderKeyFor, type AlertHorizon } from './window.js';

const HOUR_MS = 60 * 60 * 1000;

export interface ReminderScannerOptions extends AlertHorizon {
  /** Unsent claims older than this are considered abandoned */
  claimTtlMs: number;
  /** IANA zone for dates in reminder text */
  zone: string;
  /** Bounded retry of the ledger confirm after a reminder went out */
  confirmAttempts: number;
  confirmBaseDelayMs: number;
}

export const DEFAULT_SCANNER_OPTIONS: ReminderScannerOptions = {
  horizonMs: 24 * HOUR_MS,
  graceMs: HOUR_MS,
  claimTtlMs: 15 * 60 * 1000,
  zone: 'UTC',
  confirmAttempts: 4,
  confirmBaseDelayMs: 500, // 0.5s -> 1s -> 2s
};

export interface ReminderScannerDeps {
  links: AccountLinkStore;
  ledger: ReminderLedger;
  tasks: TaskSource;
  notifier: Notifier;
  logger: Logger;
  clock?: () => Date;
}

/**
 * Outcome of one scan
 */
export interface ScanSummary {
  accounts: number;
  /** Accounts whose task list could not be read */
  skippedAccounts: number;
  /** Tasks inside the alert horizon */
  eligibleTasks: number;
  remindersSent: number;
  /** Tasks that failed with an unexpected error */
  failedTasks: number;
}

/**
 * Reminder Scanner
 *
 * For every linked account, lists tasks and sends one reminder per
 * due-date window:
 * 1. Skip done tasks and tasks without a due date
 * 2. Skip tasks outside the alert horizon
 * 3. Claim the window in the ledger (atomic), send, then confirm
 *
 * A failed send releases the claim so a later scan retries. A failed
 * confirm is retried without resending.
 */
export class ReminderScanner {
  private readonly options: ReminderScannerOptions;
  private readonly clock: () => Date;
  private running: Promise<ScanSummary> | null = null;

  constructor(
    private readonly deps: ReminderScannerDeps,
    options: Partial<ReminderScannerOptions> = {}
  ) {
    this.options = { ...DEFAULT_SCANNER_OPTIONS, ...options };
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Timer entry point
   *
   * Skips (resolves null) while the previous tick is still running.
   */
  tick(): Promise<ScanSummary | null> {
    if (this.running) {
      this.deps.logger.warn('Reminder scan still running, skipping this tick');
      return Promise.resolve(null);
    }

    const scan = this.scan(this.clock()).finally(() => {
      this.running = null;
    });
    this.running = scan;
    return scan;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  /**
   * Run one full scan
   */
  async scan(now: Date): Promise<ScanSummary> {
    const summary: ScanSummary = {
      accounts: 0,
      skippedAccounts: 0,
      eligibleTasks: 0,
      remindersSent: 0,
      failedTasks: 0,
    };

    const links = await this.deps.links.list();
    const chatsByAccount = new Map<TaskAccountId, ChatIdentity[]>();
    for (const link of links) {
      const chats = chatsByAccount.get(link.taskAccountId) ?? [];
      chats.push(link.chatIdentity);
      chatsByAccount.set(link.taskAccountId, chats);
    }

    for (const [account, chats] of chatsByAccount) {
      summary.accounts++;

      let tasks: BoardTask[];
      try {
        tasks = await this.deps.tasks.listTasks(account);
      } catch (error) {
        summary.skippedAccounts++;
        this.deps.logger.warn(
          { taskAccountId: account, error: describeError(error) },
          'Could not list tasks, skipping account'
        );
        continue;
      }

      for (const task of tasks) {
        if (!isReminderDue(task, now, this.options)) {
          continue;
        }
        summary.eligibleTasks++;

        try {
          if (await this.remind(account, chats, task, now)) {
            summary.remindersSent++;
          }
        } catch (error) {
          summary.failedTasks++;
          this.deps.logger.error(
            { taskAccountId: account, taskId: task.id, error: describeError(error) },
            'Reminder processing failed'
          );
        }
      }
    }

    this.deps.logger.info(summary, 'Reminder scan finished');
    return summary;
  }

  /**
   * Send the reminder for one task window if nobody has yet
   *
   * @returns True when this call delivered the reminder
   */
  private async remind(
    account: TaskAccountId,
    chats: ChatIdentity[],
    task: BoardTask & { dueAt: Date },
    now: Date
  ): Promise<boolean> {
    const key = reminderKeyFor(account, task.id, task.dueAt);
    const context = { taskAccountId: account, taskId: task.id, dueWindowKey: key.dueWindowKey };

    const existing = await this.deps.ledger.find(key);
    if (existing?.sentAt) {
      return false;
    }

    const claimed = await this.deps.ledger.claim(key, {
      dueAt: task.dueAt,
      now,
      staleAfterMs: this.options.claimTtlMs,
    });
    if (!claimed) {
      this.deps.logger.debug(context, 'Reminder window already claimed');
      return false;
    }

    const text = formatReminder(task, task.dueAt, now, this.options.zone);
    const results = await Promise.allSettled(
      chats.map((chat) => this.deps.notifier.sendMessage(chat, text))
    );

    let delivered = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        delivered++;
      } else {
        this.deps.logger.warn(
          { ...context, chatIdentity: chats[index], error: describeError(result.reason) },
          'Reminder delivery failed'
        );
      }
    });

    if (delivered === 0) {
      await this.deps.ledger.release(key, now);
      return false;
    }

    await this.confirm(key, context);
    this.deps.logger.info({ ...context, recipients: delivered }, 'Reminder sent');
    return true;
  }

  /**
   * Record the window as sent, retrying with backoff
   *
   * The reminder is already out at this point, so a persistent failure is
   * logged and not thrown. The window may be reminded again once the claim
   * goes stale.
   */
  private async confirm(key: ReminderKey, context: Record<string, unknown>): Promise<void> {
    const attempts = Math.max(1, this.options.confirmAttempts);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.deps.ledger.confirm(key, this.clock());
        return;
      } catch (error) {
        if (attempt === attempts) {
          this.deps.logger.error(
            { ...context, attempts, error: describeError(error) },
            'REMINDER SENT BUT LEDGER CONFIRM FAILED - window may be reminded again'
          );
          return;
        }

        const delay = Math.pow(2, attempt - 1) * this.options.confirmBaseDelayMs;
        this.deps.logger.warn(
          { ...context, attempt, delay, error: describeError(error) },
          'Ledger confirm failed, retrying'
        );
        await sleep(delay);
      }
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
