import { pgTable, text, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Account links table
 * One row per chat identity; re-binding overwrites the row
 */
export const accountLinks = pgTable(
  'account_links',
  {
    /** LINE userId, groupId or roomId */
    chatIdentity: text('chat_identity').primaryKey(),

    /** Linked task-board member, e.g. trello@member123 */
    taskAccountId: text('task_account_id').notNull(),

    /** When the current binding was made */
    linkedAt: timestamp('linked_at', { withTimezone: true }).notNull(),

    // Timestamps
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index('idx_account_links_account').on(table.taskAccountId)]
);

export type AccountLinkRow = typeof accountLinks.$inferSelect;
