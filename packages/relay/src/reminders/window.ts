import { createHash } from 'node:crypto';
import type { BoardTask, ReminderKey, TaskAccountId } from '@taskrelay/shared-types';

/**
 * Deterministic id of a task's current due-date window
 *
 * Changes whenever the due date changes, so a moved deadline is a new window.
 */
export function dueWindowKey(taskId: string, dueAt: Date): string {
  return createHash('sha256').update(`${taskId}|${dueAt.toISOString()}`).digest('hex');
}

export function reminderKeyFor(
  taskAccountId: TaskAccountId,
  taskId: string,
  dueAt: Date
): ReminderKey {
  return { taskAccountId, taskId, dueWindowKey: dueWindowKey(taskId, dueAt) };
}

export interface AlertHorizon {
  /** How far ahead of the due date a reminder may fire */
  horizonMs: number;
  /** How long after the due date a reminder may still fire */
  graceMs: number;
}

/**
 * Whether a task qualifies for a reminder right now
 *
 * Done tasks and tasks without a due date never do.
 */
export function isReminderDue(
  task: BoardTask,
  now: Date,
  horizon: AlertHorizon
): task is BoardTask & { dueAt: Date } {
  if (task.status === 'done' || !task.dueAt) {
    return false;
  }

  const untilDue = task.dueAt.getTime() - now.getTime();
  return untilDue <= horizon.horizonMs && untilDue >= -horizon.graceMs;
}
