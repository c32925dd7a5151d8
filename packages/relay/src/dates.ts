import { DateTime } from 'luxon';

/**
 * Loose date parsing for capture fields
 *
 * Understands:
 * - "today", "tomorrow"
 * - ISO dates: "2026-10-25"
 * - weekdays, optionally prefixed with "next": "friday", "next mon"
 * - clock times: "14:30"
 * - time-of-day words: morning, noon, afternoon, evening, tonight
 * - a leading "by" or "before"
 */

/** Hour used when only a day is given */
export const DEFAULT_DUE_HOUR = 17;

const WEEKDAYS: Record<string, number> = {
  monday: 1,
  mon: 1,
  tuesday: 2,
  tue: 2,
  tues: 2,
  wednesday: 3,
  wed: 3,
  thursday: 4,
  thu: 4,
  thur: 4,
  thurs: 4,
  friday: 5,
  fri: 5,
  saturday: 6,
  sat: 6,
  sunday: 7,
  sun: 7,
};

const TIME_OF_DAY: Array<[RegExp, number]> = [
  [/\bmorning\b/, 8],
  [/\bnoon\b/, 12],
  [/\bafternoon\b/, 14],
  [/\bevening\b/, 20],
  [/\btonight\b/, 20],
];

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const CLOCK = /\b(\d{1,2}):(\d{2})\b/;

export interface ParseWhenOptions {
  now: Date;
  /** IANA zone the user's words refer to */
  zone: string;
}

/**
 * Parse a due/start expression
 *
 * @returns The instant, or null when the text is not understood
 */
export function parseWhen(input: string, options: ParseWhenOptions): Date | null {
  let text = input.trim().toLowerCase().replace(/^(by|before)\s+/, '');
  let hour: number | null = null;
  let minute = 0;

  const clock = CLOCK.exec(text);
  if (clock) {
    hour = Number(clock[1]);
    minute = Number(clock[2]);
    text = text.replace(clock[0], ' ');
  }

  for (const [pattern, defaultHour] of TIME_OF_DAY) {
    if (pattern.test(text)) {
      hour ??= defaultHour;
      text = text.replace(pattern, ' ');
      break;
    }
  }

  if (hour !== null && (hour > 23 || minute > 59)) {
    return null;
  }

  text = text.replace(/\s+/g, ' ').trim();
  const day = resolveDay(text, hour !== null, options);
  if (!day || !day.isValid) {
    return null;
  }

  return day
    .set({ hour: hour ?? DEFAULT_DUE_HOUR, minute, second: 0, millisecond: 0 })
    .toJSDate();
}

function resolveDay(text: string, hasTime: boolean, options: ParseWhenOptions): DateTime | null {
  const today = DateTime.fromJSDate(options.now, { zone: options.zone }).startOf('day');

  if (text === '') {
    // A bare time means today
    return hasTime ? today : null;
  }
  if (text === 'today') {
    return today;
  }
  if (text === 'tomorrow') {
    return today.plus({ days: 1 });
  }
  if (ISO_DATE.test(text)) {
    return DateTime.fromISO(text, { zone: options.zone });
  }

  const weekday = /^(next )?([a-z]+)$/.exec(text);
  const target = weekday ? WEEKDAYS[weekday[2] ?? ''] : undefined;
  if (weekday && target !== undefined) {
    let offset = (target - today.weekday + 7) % 7;
    if (weekday[1] && offset === 0) {
      offset = 7;
    }
    return today.plus({ days: offset });
  }

  return null;
}
