import { type DateRange, type TimeWindow, Weekday } from '../schedule/schedule.types.js';
import { clockTimeToHours, isClockTime, parseDateKey } from './date.js';

export interface ValidationResult {
  isValid: boolean;
  error?: string;
}

const WEEKDAY_KEYS = new Set<string>(Object.values(Weekday));

export function isWeekday(value: string): value is Weekday {
  return WEEKDAY_KEYS.has(value);
}

/**
 * A date range is usable when both ends are real dates and the end
 * (exclusive) lies after the start.
 */
export function validateDateRange(range: DateRange): ValidationResult {
  if (!range.start || !range.end) {
    return { isValid: false, error: 'Both start and end dates are required' };
  }

  if (!parseDateKey(range.start)) {
    return { isValid: false, error: `start date "${range.start}" is not a valid date` };
  }

  if (!parseDateKey(range.end)) {
    return { isValid: false, error: `end date "${range.end}" is not a valid date` };
  }

  if (range.end <= range.start) {
    return { isValid: false, error: 'end date must be after start date' };
  }

  return { isValid: true };
}

/**
 * Windows must stay on one calendar date: cross-midnight windows are not supported.
 */
export function validateTimeWindow(window: Pick<TimeWindow, 'start' | 'end'>): ValidationResult {
  if (!isClockTime(window.start)) {
    return { isValid: false, error: `start time "${window.start}" must use HH:MM` };
  }

  if (!isClockTime(window.end)) {
    return { isValid: false, error: `end time "${window.end}" must use HH:MM` };
  }

  if (clockTimeToHours(window.end) <= clockTimeToHours(window.start)) {
    return { isValid: false, error: `end time ${window.end} must be after start time ${window.start}` };
  }

  return { isValid: true };
}
