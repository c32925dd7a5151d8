import type { AccountLink, ChatIdentity, TaskAccountId } from '@taskrelay/shared-types';
import type { AccountLinkRepository } from '../ports.js';
import { InvalidAccountFormatError } from '../errors.js';
import { isValidTaskAccountId } from './account-id.js';

/**
 * Account Link Store
 *
 * Maps a chat identity to the task-board account it was bound to.
 * Re-binding overwrites; links never expire.
 */
export class AccountLinkStore {
  constructor(
    private readonly repository: AccountLinkRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Bind a chat identity to a task account
   *
   * @throws InvalidAccountFormatError if the id is malformed; nothing is stored
   */
  async bind(chatIdentity: ChatIdentity, taskAccountId: TaskAccountId): Promise<AccountLink> {
    const accountId = taskAccountId.trim();
    if (!isValidTaskAccountId(accountId)) {
      throw new InvalidAccountFormatError(accountId);
    }

    const link: AccountLink = {
      chatIdentity,
      taskAccountId: accountId,
      linkedAt: this.clock(),
    };
    await this.repository.upsert(link);
    return link;
  }

  async lookup(chatIdentity: ChatIdentity): Promise<TaskAccountId | null> {
    const link = await this.repository.find(chatIdentity);
    return link?.taskAccountId ?? null;
  }

  list(): Promise<AccountLink[]> {
    return this.repository.findAll();
  }
}
