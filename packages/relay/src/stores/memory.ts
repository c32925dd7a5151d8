import type { AccountLink, ChatIdentity, ReminderKey, ReminderRecord } from '@taskrelay/shared-types';
import type { AccountLinkRepository, ClaimOptions, ReminderLedger } from '../ports.js';

/**
 * In-memory stores
 *
 * Single-process stand-ins for the Postgres repositories. Every method
 * completes its read-modify-write before yielding, so claim() is atomic
 * within one event loop.
 */

export class InMemoryAccountLinkRepository implements AccountLinkRepository {
  private readonly links = new Map<ChatIdentity, AccountLink>();

  async upsert(link: AccountLink): Promise<void> {
    this.links.set(link.chatIdentity, { ...link });
  }

  async find(chatIdentity: ChatIdentity): Promise<AccountLink | null> {
    const link = this.links.get(chatIdentity);
    return link ? { ...link } : null;
  }

  async findAll(): Promise<AccountLink[]> {
    return [...this.links.values()].map((link) => ({ ...link }));
  }
}

function ledgerKey(key: ReminderKey): string {
  return `${key.taskAccountId}\u0000${key.taskId}\u0000${key.dueWindowKey}`;
}

export class InMemoryReminderLedger implements ReminderLedger {
  private readonly records = new Map<string, ReminderRecord>();

  async find(key: ReminderKey): Promise<ReminderRecord | null> {
    const record = this.records.get(ledgerKey(key));
    return record ? { ...record } : null;
  }

  async claim(key: ReminderKey, options: ClaimOptions): Promise<boolean> {
    const id = ledgerKey(key);
    const existing = this.records.get(id);

    if (existing) {
      const stale =
        existing.sentAt === null &&
        options.now.getTime() - existing.claimedAt.getTime() > options.staleAfterMs;
      if (!stale) {
        return false;
      }
    }

    this.records.set(id, {
      taskAccountId: key.taskAccountId,
      taskId: key.taskId,
      dueWindowKey: key.dueWindowKey,
      dueAt: options.dueAt,
      claimedAt: options.now,
      sentAt: null,
    });
    return true;
  }

  async confirm(key: ReminderKey, sentAt: Date): Promise<void> {
    const record = this.records.get(ledgerKey(key));
    if (record) {
      record.sentAt = sentAt;
    }
  }

  async release(key: ReminderKey, claimedAt: Date): Promise<void> {
    const id = ledgerKey(key);
    const record = this.records.get(id);
    if (record && record.sentAt === null && record.claimedAt.getTime() === claimedAt.getTime()) {
      this.records.delete(id);
    }
  }

  async prune(dueBefore: Date): Promise<number> {
    let removed = 0;
    for (const [id, record] of this.records) {
      if (record.dueAt.getTime() < dueBefore.getTime()) {
        this.records.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /** Number of records, claimed or sent */
  get size(): number {
    return this.records.size;
  }
}
