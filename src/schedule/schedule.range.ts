import type { DateTime } from 'luxon';
import { DEFAULT_DURATION_MONTHS } from '../constants.js';
import { getToday, parseDateKey, toDateKey } from '../utils/date.js';
import { validateDateRange } from '../utils/validation.js';
import { EmptyRangeWarning, InvalidConfigurationError } from './schedule.errors.js';
import type { DateRange } from './schedule.types.js';

export interface DateRangeDefaults {
  startDate?: string;
  durationMonths?: number;
}

export interface DateRangeInput {
  startOverride?: DateTime;
  endOverride?: DateTime;
  defaults?: DateRangeDefaults;
  today?: DateTime;
}

export interface DateRangeResult {
  range: DateRange;
  warning?: EmptyRangeWarning;
}

/**
 * Resolution order for each end: explicit override, then config default,
 * then today (start) or start + duration months (end).
 */
export function calculateDateRange({
  startOverride,
  endOverride,
  defaults = {},
  today = getToday(),
}: DateRangeInput): DateRangeResult {
  let startDate: DateTime;
  if (startOverride) {
    startDate = startOverride;
  } else if (defaults.startDate) {
    const configured = parseDateKey(defaults.startDate);
    if (!configured) {
      throw new InvalidConfigurationError(`Invalid start_date "${defaults.startDate}", expected YYYY-MM-DD`);
    }
    startDate = configured;
  } else {
    startDate = today;
  }

  const endDate = endOverride ?? startDate.plus({ months: defaults.durationMonths ?? DEFAULT_DURATION_MONTHS });

  const range: DateRange = {
    start: toDateKey(startDate),
    end: toDateKey(endDate),
  };

  const validation = validateDateRange(range);
  if (!validation.isValid) {
    return { range, warning: new EmptyRangeWarning(range.start, range.end) };
  }

  return { range };
}
