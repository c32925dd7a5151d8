import type { AccountLink, ChatIdentity } from '@taskrelay/shared-types';
import type { AccountLinkRepository } from '@taskrelay/relay';
import { eq } from 'drizzle-orm';
import type { DbClient } from '../client.js';
import { accountLinks, type AccountLinkRow } from '../schema/index.js';

function toAccountLink(row: AccountLinkRow): AccountLink {
  return {
    chatIdentity: row.chatIdentity,
    taskAccountId: row.taskAccountId,
    linkedAt: row.linkedAt,
  };
}

/**
 * Postgres-backed account links
 *
 * upsert is a single INSERT ... ON CONFLICT, so concurrent binds for one
 * chat identity resolve to whichever write lands last.
 */
export class DrizzleAccountLinkRepository implements AccountLinkRepository {
  constructor(private readonly db: DbClient) {}

  async upsert(link: AccountLink): Promise<void> {
    await this.db
      .insert(accountLinks)
      .values({
        chatIdentity: link.chatIdentity,
        taskAccountId: link.taskAccountId,
        linkedAt: link.linkedAt,
      })
      .onConflictDoUpdate({
        target: accountLinks.chatIdentity,
        set: {
          taskAccountId: link.taskAccountId,
          linkedAt: link.linkedAt,
          updatedAt: new Date(),
        },
      });
  }

  async find(chatIdentity: ChatIdentity): Promise<AccountLink | null> {
    const row = await this.db.query.accountLinks.findFirst({
      where: eq(accountLinks.chatIdentity, chatIdentity),
    });
    return row ? toAccountLink(row) : null;
  }

  async findAll(): Promise<AccountLink[]> {
    const rows = await this.db.query.accountLinks.findMany();
    return rows.map(toAccountLink);
  }
}
