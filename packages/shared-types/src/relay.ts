/**
 * Relay Domain Types
 * Shared between the core engine, the storage layer and the adapters
 */

/**
 * Opaque identifier of a chat user or conversation
 */
export type ChatIdentity = string;

/**
 * Linked task-board member, e.g. "trello@member123"
 */
export type TaskAccountId = string;

/**
 * Task status as seen by the relay
 * - open: not started
 * - in-progress: in one of the configured "doing" lists
 * - done: due date marked complete or card archived
 */
export type TaskStatus = 'open' | 'in-progress' | 'done';

/**
 * Read-only view of a task on the board
 */
export interface BoardTask {
  id: string;
  title: string;
  /** Null when the task has no due date */
  dueAt: Date | null;
  status: TaskStatus;
  url?: string;
}

/**
 * Fields for a new task
 */
export interface TaskDraft {
  title: string;
  dueAt?: Date | null;
  startAt?: Date | null;
  /** Another board member to add to the task, by username or id */
  member?: string;
}

/**
 * Result of creating a task
 */
export interface CreatedTask {
  id: string;
  /** Set when draft.member matched no board member; the task exists without them */
  unknownMember?: string;
}

/**
 * Chat identity to task-board account binding
 */
export interface AccountLink {
  chatIdentity: ChatIdentity;
  taskAccountId: TaskAccountId;
  linkedAt: Date;
}

/**
 * Identifies one due-date window of one task, as seen by one account
 *
 * A card shared by several linked members is reminded once per account.
 */
export interface ReminderKey {
  taskAccountId: TaskAccountId;
  taskId: string;
  dueWindowKey: string;
}

/**
 * Ledger entry for a reminder window
 *
 * Created by a claim before the reminder goes out; sentAt is set once it
 * has been delivered.
 */
export interface ReminderRecord extends ReminderKey {
  dueAt: Date;
  claimedAt: Date;
  sentAt: Date | null;
}
