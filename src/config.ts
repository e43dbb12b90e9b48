export const IS_PRODUCTION = process.env.NODE_ENV === 'production';

export const { LOG_LEVEL } = process.env;

/** Directory under which each config's output directory is created. */
export const SCHEDULE_OUTPUT_ROOT = process.env.SCHEDULE_OUTPUT_ROOT || '.';

/** Skips writing the SVG timeline */
export const DISABLE_TIMELINE_EXPORT =
  process.env.DISABLE_TIMELINE_EXPORT === 'true' || process.env.DISABLE_TIMELINE_EXPORT === '1';
