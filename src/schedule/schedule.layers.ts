import { getDatesInRange, getWeekday, parseDateKey, toDateKey } from '../utils/date.js';
import type { DateRange, EnumeratedDate, LayerDefinition } from './schedule.types.js';

/**
 * Lists the dates in `[range.start, range.end)` whose weekday has a time
 * window in the layer, in chronological order. This order drives rotation
 * indexing, so it must never be reshuffled.
 */
export function enumerateLayerDates(layer: LayerDefinition, range: DateRange): EnumeratedDate[] {
  const startDate = parseDateKey(range.start);
  const endDate = parseDateKey(range.end);
  if (!startDate || !endDate) {
    return [];
  }

  const entries: EnumeratedDate[] = [];
  for (const date of getDatesInRange(startDate, endDate)) {
    const weekday = getWeekday(date);
    if (layer.timeWindows[weekday]) {
      entries.push({ date: toDateKey(date), weekday });
    }
  }

  return entries;
}
