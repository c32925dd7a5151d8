import { pgTable, text, timestamp, primaryKey, index } from 'drizzle-orm/pg-core';

/**
 * Reminder ledger table
 * Which task due-date windows have been reminded
 *
 * The composite primary key is what makes a claim atomic: a second
 * INSERT for the same window conflicts instead of creating a row.
 */
export const reminderLedger = pgTable(
  'reminder_ledger',
  {
    /** Account the window is reminded for */
    taskAccountId: text('task_account_id').notNull(),

    /** Trello card id */
    taskId: text('task_id').notNull(),

    /** sha256(taskId|dueAt), changes when the due date moves */
    dueWindowKey: text('due_window_key').notNull(),

    /** Due date of the window, used for pruning */
    dueAt: timestamp('due_at', { withTimezone: true }).notNull(),

    /** When the current claim was taken */
    claimedAt: timestamp('claimed_at', { withTimezone: true }).notNull(),

    /** Null until the reminder has been delivered */
    sentAt: timestamp('sent_at', { withTimezone: true }),
  },
  (table) => [
    primaryKey({ columns: [table.taskAccountId, table.taskId, table.dueWindowKey] }),
    index('idx_reminder_ledger_due_at').on(table.dueAt),
  ]
);

export type ReminderLedgerRow = typeof reminderLedger.$inferSelect;
