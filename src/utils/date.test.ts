import { describe, it, expect, vi, afterEach } from 'vitest';
import { DateTime } from 'luxon';
import {
  clockTimeToHours,
  combineDateAndTime,
  getDatesInRange,
  getToday,
  getWeekday,
  isClockTime,
  parseDateKey,
  resolveDateExpression,
  toDateKey,
} from './date.js';
import { InvalidDateExpressionError } from '../schedule/schedule.errors.js';
import { Weekday } from '../schedule/schedule.types.js';
import { ACCEPTED_DATE_FORMATS } from '../constants.js';

const reference = DateTime.fromISO('2026-01-01', { zone: 'utc' });

function resolve(expression: string, referenceDate: DateTime = reference): string {
  return toDateKey(resolveDateExpression(expression, referenceDate));
}

describe('date utilities', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('resolveDateExpression', () => {
    it('should return the reference date for "today" in any case', () => {
      expect(resolve('today')).toBe('2026-01-01');
      expect(resolve('  TODAY ')).toBe('2026-01-01');
    });

    it('should add days for +N and +Nd', () => {
      expect(resolve('+2')).toBe('2026-01-03');
      expect(resolve('+2d')).toBe('2026-01-03');
      expect(resolve('+0d')).toBe('2026-01-01');
      expect(resolve('+45D')).toBe('2026-02-15');
    });

    it('should add weeks for +Nw', () => {
      expect(resolve('+3w')).toBe('2026-01-22');
    });

    it('should add calendar months and years', () => {
      expect(resolve('+1m')).toBe('2026-02-01');
      expect(resolve('+12m')).toBe('2027-01-01');
      expect(resolve('+1y')).toBe('2027-01-01');
    });

    it('should clamp month arithmetic to the end of the month', () => {
      expect(resolve('+1m', DateTime.fromISO('2026-01-31', { zone: 'utc' }))).toBe('2026-02-28');
      expect(resolve('+1y', DateTime.fromISO('2024-02-29', { zone: 'utc' }))).toBe('2025-02-28');
    });

    it('should parse absolute dates and ignore the reference', () => {
      expect(resolve(' 2026-03-15 ')).toBe('2026-03-15');
    });

    it.each(['+2x', '+d', 'tomorrow', '2026-13-01', '2026-02-30', '2026/01/05', '-2d', ''])(
      'should reject %j',
      (expression) => {
        expect(() => resolveDateExpression(expression, reference)).toThrow(InvalidDateExpressionError);
      },
    );

    it.each(['+300000y', '+99999999999999999999d'])('should reject the out-of-range offset %j', (expression) => {
      expect(() => resolveDateExpression(expression, reference)).toThrow(InvalidDateExpressionError);
    });

    it('should carry the offending input and the accepted formats', () => {
      try {
        resolveDateExpression('+2X', reference);
        expect.unreachable('expected an InvalidDateExpressionError');
      } catch (dateError) {
        if (!(dateError instanceof InvalidDateExpressionError)) {
          throw dateError;
        }
        expect(dateError.expression).toBe('+2X');
        expect(dateError.acceptedFormats).toEqual(ACCEPTED_DATE_FORMATS);
        expect(dateError.message).toBe(
          "Invalid date format '+2X'. Use one of: YYYY-MM-DD, +N, +Nd, +Nw, +Nm, +Ny, today",
        );
      }
    });

    it('should default the reference to today at midnight', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date(2026, 0, 10, 15, 30));

      expect(toDateKey(getToday())).toBe('2026-01-10');
      expect(toDateKey(resolveDateExpression('+1d'))).toBe('2026-01-11');
      expect(getToday().hour).toBe(0);
    });
  });

  describe('parseDateKey', () => {
    it('should accept strict yyyy-MM-dd dates only', () => {
      expect(parseDateKey('2026-01-05')?.toISODate()).toBe('2026-01-05');
      expect(parseDateKey('2026-1-5')).toBeNull();
      expect(parseDateKey('2026-02-30')).toBeNull();
    });
  });

  describe('getWeekday', () => {
    it('should map luxon weekdays to weekday keys', () => {
      expect(getWeekday(DateTime.fromISO('2026-01-05', { zone: 'utc' }))).toBe(Weekday.Monday);
      expect(getWeekday(DateTime.fromISO('2026-01-11', { zone: 'utc' }))).toBe(Weekday.Sunday);
    });
  });

  describe('getDatesInRange', () => {
    it('should include the start and exclude the end', () => {
      const dates = getDatesInRange(
        DateTime.fromISO('2026-01-30', { zone: 'utc' }),
        DateTime.fromISO('2026-02-02', { zone: 'utc' }),
      );
      expect(dates.map(toDateKey)).toEqual(['2026-01-30', '2026-01-31', '2026-02-01']);
    });

    it('should return nothing when the end is not after the start', () => {
      const day = DateTime.fromISO('2026-01-30', { zone: 'utc' });
      expect(getDatesInRange(day, day)).toEqual([]);
    });
  });

  describe('clock times', () => {
    it('should validate HH:MM', () => {
      expect(isClockTime('08:00')).toBe(true);
      expect(isClockTime('23:59')).toBe(true);
      expect(isClockTime('8:00')).toBe(false);
      expect(isClockTime('24:00')).toBe(false);
    });

    it('should convert clock times to fractional hours', () => {
      expect(clockTimeToHours('08:30')).toBe(8.5);
      expect(clockTimeToHours('13:45')).toBe(13.75);
    });

    it('should combine a date and a clock time on the same day', () => {
      expect(combineDateAndTime('2026-01-05', '08:30').toFormat('yyyy-MM-dd HH:mm')).toBe('2026-01-05 08:30');
    });
  });
});
