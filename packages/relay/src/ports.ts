import type {
  AccountLink,
  BoardTask,
  ChatIdentity,
  CreatedTask,
  ReminderKey,
  ReminderRecord,
  TaskAccountId,
  TaskDraft,
} from '@taskrelay/shared-types';

/**
 * Persistence behind the Account Link Store
 *
 * Implementations only store; validation happens in AccountLinkStore.
 */
export interface AccountLinkRepository {
  /** Insert or overwrite the link for link.chatIdentity */
  upsert(link: AccountLink): Promise<void>;
  find(chatIdentity: ChatIdentity): Promise<AccountLink | null>;
  findAll(): Promise<AccountLink[]>;
}

/**
 * Claim settings for the ledger
 */
export interface ClaimOptions {
  dueAt: Date;
  now: Date;
  /** An unsent claim older than this may be taken over */
  staleAfterMs: number;
}

/**
 * Durable record of reminder windows that have fired
 *
 * claim() is the only way a record comes into existence and must be
 * atomic per (taskAccountId, taskId, dueWindowKey).
 */
export interface ReminderLedger {
  find(key: ReminderKey): Promise<ReminderRecord | null>;
  /**
   * Create the record for key, or take over a stale unsent claim.
   * Resolves true when this caller now owns the window.
   */
  claim(key: ReminderKey, options: ClaimOptions): Promise<boolean>;
  /** Mark the window as sent */
  confirm(key: ReminderKey, sentAt: Date): Promise<void>;
  /**
   * Drop an unsent claim so a later scan can retry. Only the claim taken
   * at claimedAt is dropped; a newer takeover is left in place.
   */
  release(key: ReminderKey, claimedAt: Date): Promise<void>;
  /** Delete records whose due date is before the cutoff, returns the count */
  prune(dueBefore: Date): Promise<number>;
}

/**
 * Task-board API as the relay needs it
 */
export interface TaskSource {
  listTasks(account: TaskAccountId): Promise<BoardTask[]>;
  createTask(account: TaskAccountId, draft: TaskDraft): Promise<CreatedTask>;
}

/**
 * Outbound chat messages
 */
export interface Notifier {
  sendMessage(chatIdentity: ChatIdentity, text: string): Promise<void>;
}

/**
 * AI text completion
 */
export interface CompletionService {
  complete(prompt: string): Promise<string>;
}
