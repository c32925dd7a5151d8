import type { Logger } from 'pino';
import { pruneReminderLedger, type ReminderLedger } from '@taskrelay/relay';

/**
 * Ledger Prune Job
 *
 * Drops reminder records whose deadline is older than the retention period.
 */
export async function runLedgerPrune(
  ledger: ReminderLedger,
  retentionDays: number,
  logger: Logger,
  now: Date = new Date()
): Promise<number> {
  return pruneReminderLedger(ledger, now, retentionDays, logger);
}
