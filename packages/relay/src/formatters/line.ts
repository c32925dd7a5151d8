import { DateTime } from 'luxon';
import type { BoardTask, TaskDraft, TaskStatus } from '@taskrelay/shared-types';

/**
 * LINE text messages may be up to 5000 characters
 */
export const MAX_LINE_TEXT_LENGTH = 5000;

/** Tasks listed in a status summary before "(+N more)" */
const STATUS_SUMMARY_LIMIT = 10;

const STATUS_DISPLAY: Record<TaskStatus, string> = {
  open: '🆕 open',
  'in-progress': '🚧 in progress',
  done: '✅ done',
};

export const GENERIC_FALLBACK_REPLY = 'Something went wrong on our side. Please try again later.';

/**
 * Format a due date in the user's zone, e.g. "Mon Oct 19, 17:00"
 */
export function formatDue(date: Date, zone: string): string {
  return DateTime.fromJSDate(date, { zone }).setLocale('en-US').toFormat('ccc LLL d, HH:mm');
}

export function formatBindSuccess(accountId: string): string {
  return `✅ Linked! Your task account is ${accountId}.`;
}

export function formatInvalidAccount(bindPrefix: string): string {
  return `That doesn't look like a task account id.\nSend '${bindPrefix} trello@<your Trello member id>'.`;
}

export function formatUnlinked(bindPrefix: string): string {
  return `Please link your Trello account first.\nSend '${bindPrefix} trello@<your Trello member id>'.`;
}

/**
 * Upstream failure reply
 *
 * @param what - What the user was waiting for, e.g. "The task board"
 */
export function formatUpstreamUnavailable(what: string): string {
  return `⚠️ ${what} is unavailable right now. Please try again later.`;
}

/**
 * Summary of a user's unfinished tasks
 */
export function formatStatusSummary(tasks: BoardTask[], zone: string): string {
  if (tasks.length === 0) {
    return '🎉 No open tasks.';
  }

  const lines: string[] = [
    `📋 ${tasks.length} open task${tasks.length === 1 ? '' : 's'}:`,
    '',
  ];

  for (const task of tasks.slice(0, STATUS_SUMMARY_LIMIT)) {
    let line = `• ${truncate(task.title, 60)} — ${STATUS_DISPLAY[task.status]}`;
    if (task.dueAt) {
      line += ` (due ${formatDue(task.dueAt, zone)})`;
    }
    lines.push(line);
  }

  if (tasks.length > STATUS_SUMMARY_LIMIT) {
    lines.push(`  (+${tasks.length - STATUS_SUMMARY_LIMIT} more)`);
  }

  return lines.join('\n');
}

/**
 * Confirmation for a captured task
 */
export function formatTaskCreated(draft: TaskDraft, zone: string): string {
  const lines = [`✅ Task created: ${truncate(draft.title, 100)}`];

  if (draft.startAt) {
    lines.push(`🟢 Starts: ${formatDue(draft.startAt, zone)}`);
  }
  if (draft.dueAt) {
    lines.push(`📅 Due: ${formatDue(draft.dueAt, zone)}`);
  }

  return lines.join('\n');
}

/**
 * Hint for a capture date that could not be parsed
 */
export function formatDateHint(field: 'due' | 'start', value: string): string {
  return `⚠️ Couldn't understand the ${field} date "${value}". Try YYYY-MM-DD, 'tomorrow' or a weekday. The task is created without it.`;
}

/**
 * Hint for a capture member that is not on the board
 */
export function formatMemberHint(member: string): string {
  return `⚠️ Couldn't find the member "${member}" on the board. The task is created without them.`;
}

/**
 * Due-date reminder
 */
export function formatReminder(task: BoardTask, dueAt: Date, now: Date, zone: string): string {
  const verb = dueAt.getTime() < now.getTime() ? 'was due' : 'is due';
  const lines = [`⏰ Reminder: "${truncate(task.title, 100)}" ${verb} ${formatDue(dueAt, zone)}`];

  if (task.url) {
    lines.push(task.url);
  }

  return lines.join('\n');
}

/**
 * Split a long message into LINE-sized chunks
 *
 * Splits on line breaks where possible; a single line longer than the
 * limit is cut hard, never between the halves of a surrogate pair.
 */
export function splitMessage(message: string, maxLength = MAX_LINE_TEXT_LENGTH): string[] {
  if (message.length <= maxLength) {
    return [message];
  }

  const messages: string[] = [];
  let current = '';

  for (const line of message.split('\n')) {
    const potentialLength = current.length + (current ? 1 : 0) + line.length;

    if (potentialLength <= maxLength) {
      current += (current ? '\n' : '') + line;
      continue;
    }

    if (current) {
      messages.push(current);
    }

    let rest = line;
    while (rest.length > maxLength) {
      const cut = isHighSurrogate(rest.charCodeAt(maxLength - 1)) ? maxLength - 1 : maxLength;
      messages.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    current = rest;
  }

  if (current) {
    messages.push(current);
  }

  return messages;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Truncate text with ellipsis
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 1) + '…';
}
