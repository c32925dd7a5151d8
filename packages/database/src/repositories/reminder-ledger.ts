import type { ReminderKey, ReminderRecord } from '@taskrelay/shared-types';
import type { ClaimOptions, ReminderLedger } from '@taskrelay/relay';
import { and, eq, isNull, lt } from 'drizzle-orm';
import type { DbClient } from '../client.js';
import { reminderLedger, type ReminderLedgerRow } from '../schema/index.js';

export function toReminderRecord(row: ReminderLedgerRow): ReminderRecord {
  return {
    taskAccountId: row.taskAccountId,
    taskId: row.taskId,
    dueWindowKey: row.dueWindowKey,
    dueAt: row.dueAt,
    claimedAt: row.claimedAt,
    sentAt: row.sentAt,
  };
}

function matchesKey(key: ReminderKey) {
  return and(
    eq(reminderLedger.taskAccountId, key.taskAccountId),
    eq(reminderLedger.taskId, key.taskId),
    eq(reminderLedger.dueWindowKey, key.dueWindowKey)
  );
}

/**
 * Postgres-backed reminder ledger
 *
 * claim() is one INSERT ... ON CONFLICT DO UPDATE ... WHERE statement:
 * - no row yet: inserted, claim won
 * - unsent row whose claim is stale: taken over, claim won
 * - anything else: no row returned, claim lost
 */
export class DrizzleReminderLedger implements ReminderLedger {
  constructor(private readonly db: DbClient) {}

  async find(key: ReminderKey): Promise<ReminderRecord | null> {
    const row = await this.db.query.reminderLedger.findFirst({
      where: matchesKey(key),
    });
    return row ? toReminderRecord(row) : null;
  }

  async claim(key: ReminderKey, options: ClaimOptions): Promise<boolean> {
    const staleBefore = new Date(options.now.getTime() - options.staleAfterMs);

    const rows = await this.db
      .insert(reminderLedger)
      .values({
        taskAccountId: key.taskAccountId,
        taskId: key.taskId,
        dueWindowKey: key.dueWindowKey,
        dueAt: options.dueAt,
        claimedAt: options.now,
      })
      .onConflictDoUpdate({
        target: [reminderLedger.taskAccountId, reminderLedger.taskId, reminderLedger.dueWindowKey],
        set: { claimedAt: options.now },
        setWhere: and(isNull(reminderLedger.sentAt), lt(reminderLedger.claimedAt, staleBefore)),
      })
      .returning({ taskId: reminderLedger.taskId });

    return rows.length > 0;
  }

  async confirm(key: ReminderKey, sentAt: Date): Promise<void> {
    await this.db.update(reminderLedger).set({ sentAt }).where(matchesKey(key));
  }

  async release(key: ReminderKey, claimedAt: Date): Promise<void> {
    await this.db
      .delete(reminderLedger)
      .where(
        and(matchesKey(key), isNull(reminderLedger.sentAt), eq(reminderLedger.claimedAt, claimedAt))
      );
  }

  async prune(dueBefore: Date): Promise<number> {
    const rows = await this.db
      .delete(reminderLedger)
      .where(lt(reminderLedger.dueAt, dueBefore))
      .returning({ taskId: reminderLedger.taskId });
    return rows.length;
  }
}
