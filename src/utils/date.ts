import { DateTime } from 'luxon';
import { CLOCK_TIME_PATTERN, DATE_FORMAT, NAIVE_ZONE } from '../constants.js';
import { InvalidDateExpressionError } from '../schedule/schedule.errors.js';
import { Weekday } from '../schedule/schedule.types.js';

const RELATIVE_DATE_PATTERN = /^\+(\d+)([dwmy])?$/;
const ABSOLUTE_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Luxon weekday number (1 = Monday, 7 = Sunday) → weekday key */
const WEEKDAYS_BY_NUMBER: Record<number, Weekday> = {
  1: Weekday.Monday,
  2: Weekday.Tuesday,
  3: Weekday.Wednesday,
  4: Weekday.Thursday,
  5: Weekday.Friday,
  6: Weekday.Saturday,
  7: Weekday.Sunday,
};

/**
 * Today's local calendar date at midnight, carried in the naive zone.
 */
export function getToday(): DateTime {
  const now = DateTime.local();
  return DateTime.fromObject({ year: now.year, month: now.month, day: now.day }, { zone: NAIVE_ZONE });
}

export function toDateKey(date: DateTime): string {
  return date.toFormat(DATE_FORMAT);
}

/**
 * Parses a strict `yyyy-MM-dd` string. Returns null for anything else,
 * including impossible dates such as 2026-02-30.
 */
export function parseDateKey(value: string): DateTime | null {
  if (!ABSOLUTE_DATE_PATTERN.test(value)) {
    return null;
  }

  const date = DateTime.fromFormat(value, DATE_FORMAT, { zone: NAIVE_ZONE });
  return date.isValid ? date : null;
}

/**
 * Resolves a date expression against a reference date (today by default).
 *
 * Accepted forms, case-insensitive and trimmed:
 * - `today`
 * - `+N` / `+Nd` days, `+Nw` weeks, `+Nm` calendar months, `+Ny` calendar years
 * - `YYYY-MM-DD`
 *
 * Month and year offsets clamp to the end of the month (2026-01-31 `+1m` → 2026-02-28).
 */
export function resolveDateExpression(expression: string, referenceDate: DateTime = getToday()): DateTime {
  const normalized = expression.trim().toLowerCase();

  if (normalized === 'today') {
    return referenceDate;
  }

  const relativeMatch = normalized.match(RELATIVE_DATE_PATTERN);
  if (relativeMatch) {
    const amount = Number(relativeMatch[1]);
    // Offsets past luxon's supported range yield an invalid DateTime rather than throwing
    const resolved = Number.isSafeInteger(amount) ? shiftDate(referenceDate, amount, relativeMatch[2] ?? 'd') : null;
    if (!resolved?.isValid) {
      throw new InvalidDateExpressionError(expression);
    }
    return resolved;
  }

  const absolute = parseDateKey(normalized);
  if (!absolute) {
    throw new InvalidDateExpressionError(expression);
  }
  return absolute;
}

function shiftDate(date: DateTime, amount: number, unit: string): DateTime {
  switch (unit) {
    case 'w':
      return date.plus({ weeks: amount });
    case 'm':
      return date.plus({ months: amount });
    case 'y':
      return date.plus({ years: amount });
    default:
      return date.plus({ days: amount });
  }
}

export function getWeekday(date: DateTime): Weekday {
  return WEEKDAYS_BY_NUMBER[date.weekday];
}

/**
 * Every calendar date in `[startDate, endDate)`, ascending.
 */
export function getDatesInRange(startDate: DateTime, endDate: DateTime): DateTime[] {
  const dates: DateTime[] = [];
  let current = startDate.startOf('day');

  while (current < endDate) {
    dates.push(current);
    current = current.plus({ days: 1 });
  }

  return dates;
}

export function isClockTime(value: string): boolean {
  return CLOCK_TIME_PATTERN.test(value);
}

/**
 * `HH:MM` → fractional hours (`08:30` → 8.5)
 */
export function clockTimeToHours(time: string): number {
  const [hours, minutes] = time.split(':').map(Number);
  return hours + minutes / 60;
}

/**
 * Combines a `yyyy-MM-dd` date with an `HH:MM` clock time on that same date.
 */
export function combineDateAndTime(date: string, time: string): DateTime {
  const [hour, minute] = time.split(':').map(Number);
  return DateTime.fromFormat(date, DATE_FORMAT, { zone: NAIVE_ZONE }).set({ hour, minute, second: 0, millisecond: 0 });
}
