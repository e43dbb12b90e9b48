import { describe, it, expect } from 'vitest';
import { filterShiftsByDateRange, getRangeLengthInDays, getShiftHours } from './schedule.utils.js';
import { Weekday } from './schedule.types.js';
import { buildShift } from '../../test/fixtures/test-data.js';

describe('schedule utilities', () => {
  it('should compute shift length in hours', () => {
    expect(getShiftHours({ startTime: '08:00', endTime: '10:30' })).toBe(2.5);
    expect(getShiftHours({ startTime: '09:40', endTime: '11:20' })).toBeCloseTo(5 / 3);
  });

  it('should count the days of a range', () => {
    expect(getRangeLengthInDays({ start: '2026-01-01', end: '2026-04-01' })).toBe(90);
    // Spans the March DST change in zones that observe it
    expect(getRangeLengthInDays({ start: '2026-03-01', end: '2026-04-01' })).toBe(31);
    expect(getRangeLengthInDays({ start: '2026-01-10', end: '2026-01-01' })).toBe(0);
  });

  it('should keep shifts inside a half-open date window', () => {
    const shifts = [
      buildShift({ date: '2026-01-05' }),
      buildShift({ date: '2026-01-06', weekday: Weekday.Tuesday }),
      buildShift({ date: '2026-01-07', weekday: Weekday.Wednesday }),
    ];

    expect(filterShiftsByDateRange(shifts, { start: '2026-01-06', end: '2026-01-07' })).toEqual([shifts[1]]);
  });
});
