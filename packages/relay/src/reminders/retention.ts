import type { Logger } from 'pino';
import type { ReminderLedger } from '../ports.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Delete ledger records for deadlines older than the retention period
 *
 * Safe because a window that old is far outside the grace period and
 * can never qualify again.
 */
export async function pruneReminderLedger(
  ledger: ReminderLedger,
  now: Date,
  retentionDays: number,
  logger: Logger
): Promise<number> {
  const cutoff = new Date(now.getTime() - retentionDays * DAY_MS);
  const removed = await ledger.prune(cutoff);
  logger.info({ removed, cutoff: cutoff.toISOString() }, 'Pruned reminder ledger');
  return removed;
}
