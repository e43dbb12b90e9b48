/**
 * Core constants shared by the rotation scheduler.
 *
 * NOTE:
 *  • Keep this file free of side-effects – everything here must be
 *    deterministically initialised at module load.
 */

/** Months covered when neither the CLI nor the config names an end date. */
export const DEFAULT_DURATION_MONTHS = 3;

export const DEFAULT_SCHEDULE_NAME = 'On-Call Schedule';

/** Calendar date format used for every date key in the engine. */
export const DATE_FORMAT = 'yyyy-MM-dd';

/** Clock-time format of every time window boundary. */
export const CLOCK_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/** Dates are naive local calendar dates; UTC is only used as a DST-free carrier. */
export const NAIVE_ZONE = 'utc';

export const ACCEPTED_DATE_FORMATS: readonly string[] = Object.freeze([
  'YYYY-MM-DD',
  '+N',
  '+Nd',
  '+Nw',
  '+Nm',
  '+Ny',
  'today',
]);

/**
 * Person fill colors (RGB hex, no leading '#').
 * Reused cyclically once there are more people than entries.
 */
export const PERSON_COLOR_PALETTE: readonly string[] = Object.freeze([
  'E8F5E9',
  'E3F2FD',
  'FFF3E0',
  'FCE4EC',
  'F3E5F5',
  'E0F2F1',
  'FFF9C4',
  'FFE0B2',
  'F8BBD0',
  'D1C4E9',
  'C8E6C9',
  'BBDEFB',
  'FFE0B2',
  'F8BBD0',
  'E1BEE7',
]);

/** Used by exporters for a person missing from the color map. */
export const FALLBACK_PERSON_COLOR = 'CCCCCC';
