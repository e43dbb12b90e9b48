import { clockTimeToHours } from '../utils/date.js';
import { filterShiftsByDateRange } from '../schedule/schedule.utils.js';
import type { DateRange, ResolvedShift, Weekday } from '../schedule/schedule.types.js';

export interface TimelineBar {
  person: string;
  layerName: string;
  startHour: number;
  endHour: number;
}

export interface TimelineColumn {
  /** Horizontal slot, 0-based, one per distinct date with shifts */
  slot: number;
  date: string;
  weekday: Weekday;
  bars: TimelineBar[];
}

export type TimelineLayout =
  | { kind: 'empty' }
  | {
      kind: 'ready';
      /** Axis bounds in whole hours */
      minHour: number;
      maxHour: number;
      columns: TimelineColumn[];
    };

/**
 * Lays out the shifts of the presentation window: whole-hour vertical
 * bounds covering every shift, and one column per date that has shifts.
 * Dates without shifts get no column.
 */
export function computeTimelineLayout(
  schedule: readonly ResolvedShift[],
  window?: DateRange,
  toHours: (time: string) => number = clockTimeToHours,
): TimelineLayout {
  const shifts = window ? filterShiftsByDateRange(schedule, window) : [...schedule];
  if (shifts.length === 0) {
    return { kind: 'empty' };
  }

  let minHour = Infinity;
  let maxHour = -Infinity;
  const columnsByDate = new Map<string, TimelineColumn>();

  for (const shift of shifts) {
    const startHour = toHours(shift.startTime);
    const endHour = toHours(shift.endTime);
    minHour = Math.min(minHour, startHour, endHour);
    maxHour = Math.max(maxHour, startHour, endHour);

    let column = columnsByDate.get(shift.date);
    if (!column) {
      column = { slot: 0, date: shift.date, weekday: shift.weekday, bars: [] };
      columnsByDate.set(shift.date, column);
    }
    column.bars.push({ person: shift.person, layerName: shift.layerName, startHour, endHour });
  }

  const columns = [...columnsByDate.values()]
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
    .map((column, slot) => ({ ...column, slot }));

  return {
    kind: 'ready',
    minHour: Math.floor(minHour),
    maxHour: Math.ceil(maxHour),
    columns,
  };
}
