import type { Logger } from 'pino';
import type { ReminderScanner, ScanSummary } from '@taskrelay/relay';

/**
 * Reminder Scan Job
 *
 * One scanner tick. Overlapping ticks are skipped by the scanner itself.
 */
export async function runReminderScan(scanner: ReminderScanner, logger: Logger): Promise<ScanSummary | null> {
  const startedAt = Date.now();
  const summary = await scanner.tick();

  if (summary) {
    logger.debug({ durationMs: Date.now() - startedAt }, 'Reminder tick complete');
  }
  return summary;
}
