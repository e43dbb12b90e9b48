import { DateTime } from 'luxon';
import { sumBy } from 'lodash-es';
import { NAIVE_ZONE } from '../constants.js';
import { clockTimeToHours } from '../utils/date.js';
import { Logger } from '../logger.js';
import { groupShiftsByPerson } from './schedule.aggregation.js';
import type { DateRange, GeneratedSchedule, ResolvedShift } from './schedule.types.js';

const logger = new Logger('schedule-utils');

export function getShiftHours(shift: Pick<ResolvedShift, 'startTime' | 'endTime'>): number {
  return clockTimeToHours(shift.endTime) - clockTimeToHours(shift.startTime);
}

export function getRangeLengthInDays(range: DateRange): number {
  const start = DateTime.fromISO(range.start, { zone: NAIVE_ZONE });
  const end = DateTime.fromISO(range.end, { zone: NAIVE_ZONE });
  const days = end.diff(start, 'days').days;
  return Math.max(0, Math.round(days));
}

/**
 * Shifts whose date falls in `[window.start, window.end)`.
 */
export function filterShiftsByDateRange<T extends { date: string }>(shifts: readonly T[], window: DateRange): T[] {
  return shifts.filter((shift) => shift.date >= window.start && shift.date < window.end);
}

export function printScheduleDiagnostics(schedule: GeneratedSchedule): void {
  const logLines = ['=== ONCALL SCHEDULE SUMMARY ==='];
  logLines.push(`Schedule: ${schedule.name}`);
  logLines.push(
    `Period: ${schedule.range.start} to ${schedule.range.end} (${getRangeLengthInDays(schedule.range)} days)`,
  );
  logLines.push(`Total layers: ${schedule.layerCount}`);
  logLines.push(`Total team members: ${schedule.personColors.size}`);
  logLines.push(`Total shifts: ${schedule.shifts.length}`);
  logLines.push('');

  const personStats: Record<string, { shifts: number; hours: number }> = {};
  for (const [person, shifts] of groupShiftsByPerson(schedule.shifts)) {
    const hours = sumBy(shifts, getShiftHours);
    personStats[person] = { shifts: shifts.length, hours };
    logLines.push(`👤 ${person}: ${shifts.length} shifts, ${hours.toFixed(1)} hours`);
  }

  logger.info(logLines.join('\n'), { personStats });
}
