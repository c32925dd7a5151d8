import { describe, it, expect } from 'vitest';
import {
  formatDue,
  formatReminder,
  formatStatusSummary,
  formatTaskCreated,
  splitMessage,
  truncate,
} from './line.js';

describe('formatDue', () => {
  it('formats in the given zone', () => {
    const due = new Date('2026-10-19T09:00:00Z');
    expect(formatDue(due, 'UTC')).toBe('Mon Oct 19, 09:00');
    expect(formatDue(due, 'Asia/Taipei')).toBe('Mon Oct 19, 17:00');
  });
});

describe('formatStatusSummary', () => {
  it('celebrates an empty list', () => {
    expect(formatStatusSummary([], 'UTC')).toBe('🎉 No open tasks.');
  });

  it('lists titles with status and due date', () => {
    const summary = formatStatusSummary(
      [
        { id: 'T1', title: 'Write report', dueAt: new Date('2026-10-19T17:00:00Z'), status: 'in-progress' },
        { id: 'T2', title: 'Call plumber', dueAt: null, status: 'open' },
      ],
      'UTC'
    );

    expect(summary).toBe(
      [
        '📋 2 open tasks:',
        '',
        '• Write report — 🚧 in progress (due Mon Oct 19, 17:00)',
        '• Call plumber — 🆕 open',
      ].join('\n')
    );
  });

  it('caps the list at ten entries', () => {
    const tasks = Array.from({ length: 12 }, (_, i) => ({
      id: `T${i}`,
      title: `Task ${i}`,
      dueAt: null,
      status: 'open' as const,
    }));

    const lines = formatStatusSummary(tasks, 'UTC').split('\n');

    expect(lines[0]).toBe('📋 12 open tasks:');
    expect(lines).toHaveLength(13);
    expect(lines[12]).toBe('  (+2 more)');
  });
});

describe('formatTaskCreated', () => {
  it('includes the due date when present', () => {
    expect(
      formatTaskCreated({ title: 'Pay rent', dueAt: new Date('2026-10-19T17:00:00Z') }, 'UTC')
    ).toBe('✅ Task created: Pay rent\n📅 Due: Mon Oct 19, 17:00');
  });

  it('is a single line without dates', () => {
    expect(formatTaskCreated({ title: 'Buy milk' }, 'UTC')).toBe('✅ Task created: Buy milk');
  });
});

describe('formatReminder', () => {
  const task = {
    id: 'T1',
    title: 'Submit report',
    dueAt: new Date('2026-10-18T11:00:00Z'),
    status: 'open' as const,
    url: 'https://trello.com/c/abc',
  };

  it('uses "is due" for upcoming deadlines', () => {
    expect(formatReminder(task, task.dueAt, new Date('2026-10-18T09:00:00Z'), 'UTC')).toBe(
      '⏰ Reminder: "Submit report" is due Sun Oct 18, 11:00\nhttps://trello.com/c/abc'
    );
  });

  it('uses "was due" once the deadline passed', () => {
    expect(formatReminder(task, task.dueAt, new Date('2026-10-18T11:30:00Z'), 'UTC')).toBe(
      '⏰ Reminder: "Submit report" was due Sun Oct 18, 11:00\nhttps://trello.com/c/abc'
    );
  });
});

describe('splitMessage', () => {
  it('returns short messages unchanged', () => {
    expect(splitMessage('hello', 10)).toEqual(['hello']);
  });

  it('splits on line breaks', () => {
    expect(splitMessage('aaaa\nbbbb\ncccc', 9)).toEqual(['aaaa\nbbbb', 'cccc']);
  });

  it('cuts lines longer than the limit', () => {
    expect(splitMessage('abcdefghij\nxy', 4)).toEqual(['abcd', 'efgh', 'ij', 'xy']);
  });

  it('keeps an emoji whole when the cut falls inside it', () => {
    expect(splitMessage('abc😀def', 4)).toEqual(['abc', '😀de', 'f']);
  });
});

describe('truncate', () => {
  it('adds an ellipsis when cutting', () => {
    expect(truncate('abcdef', 4)).toBe('abc…');
    expect(truncate('abc', 4)).toBe('abc');
  });
});
