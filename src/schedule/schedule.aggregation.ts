import { sortBy } from 'lodash-es';
import type { DateGroup, ResolvedShift } from './schedule.types.js';

/**
 * Merges every layer's shifts into the canonical order: date, then window
 * start time. Both keys are fixed-width strings, so lexical order is
 * chronological. `sortBy` is stable, which keeps layer declaration order
 * for shifts that share a date and start time.
 */
export function aggregateShifts(shiftsByLayer: ReadonlyArray<readonly ResolvedShift[]>): ResolvedShift[] {
  return sortShifts(shiftsByLayer.flat());
}

export function sortShifts(shifts: readonly ResolvedShift[]): ResolvedShift[] {
  return sortBy(shifts, ['date', 'startTime']);
}

/**
 * Splits the schedule into runs of consecutive shifts on the same date.
 * A new group starts whenever the date differs from the previous shift's.
 */
export function groupShiftsByDate(schedule: readonly ResolvedShift[]): DateGroup[] {
  const groups: DateGroup[] = [];
  let current: DateGroup | undefined;

  for (const shift of schedule) {
    if (!current || current.date !== shift.date) {
      current = { date: shift.date, weekday: shift.weekday, shifts: [] };
      groups.push(current);
    }
    current.shifts.push(shift);
  }

  return groups;
}

/**
 * Shifts per person in order of first appearance.
 */
export function groupShiftsByPerson(schedule: readonly ResolvedShift[]): Map<string, ResolvedShift[]> {
  const byPerson = new Map<string, ResolvedShift[]>();
  for (const shift of schedule) {
    const shifts = byPerson.get(shift.person);
    if (shifts) {
      shifts.push(shift);
    } else {
      byPerson.set(shift.person, [shift]);
    }
  }
  return byPerson;
}
