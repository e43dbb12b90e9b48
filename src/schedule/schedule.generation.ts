import { basename, extname, join } from 'path';
import { mkdirSync } from 'fs';
import { DateTime } from 'luxon';
import { DISABLE_TIMELINE_EXPORT, SCHEDULE_OUTPUT_ROOT } from '../config.js';
import { Logger } from '../logger.js';
import { exportCalendarFeeds } from '../calendar/calendar.ics.js';
import { exportSpreadsheet } from '../spreadsheet/spreadsheet.exporter.js';
import { exportTimeline } from '../timeline/timeline.renderer.js';
import { getToday, resolveDateExpression } from '../utils/date.js';
import { aggregateShifts, groupShiftsByDate } from './schedule.aggregation.js';
import { assignPersonColors } from './schedule.colors.js';
import { loadScheduleConfig } from './schedule.config.js';
import { NoShiftsProducedError, type EmptyRangeWarning } from './schedule.errors.js';
import { enumerateLayerDates } from './schedule.layers.js';
import { calculateDateRange } from './schedule.range.js';
import { assignRotation, materializeShifts } from './schedule.rotation.js';
import type { DateRange, GeneratedSchedule, ScheduleConfig } from './schedule.types.js';
import { printScheduleDiagnostics } from './schedule.utils.js';

const logger = new Logger('schedule-generation');

export interface GenerateScheduleOptions {
  startOverride?: DateTime;
  endOverride?: DateTime;
  today?: DateTime;
}

export interface GenerateScheduleResult {
  schedule: GeneratedSchedule;
  warning?: EmptyRangeWarning;
}

/**
 * Runs the scheduling engine: range → per-layer enumeration and rotation →
 * canonical ordering → colors. Pure; touches no files.
 */
export function generateSchedule(config: ScheduleConfig, options: GenerateScheduleOptions = {}): GenerateScheduleResult {
  const { range, warning } = calculateDateRange({
    startOverride: options.startOverride,
    endOverride: options.endOverride,
    defaults: { startDate: config.startDate, durationMonths: config.durationMonths },
    today: options.today,
  });

  const shiftsByLayer = config.layers.map((layer, layerIndex) => {
    const slots = assignRotation(layer, layerIndex, enumerateLayerDates(layer, range));
    return materializeShifts(slots);
  });

  const shifts = aggregateShifts(shiftsByLayer);

  return {
    schedule: {
      name: config.name,
      description: config.description,
      range,
      layerCount: config.layers.length,
      shifts,
      days: groupShiftsByDate(shifts),
      personColors: assignPersonColors(shifts),
    },
    warning,
  };
}

export interface ResolvedDateArguments {
  startOverride?: DateTime;
  endOverride?: DateTime;
}

/**
 * Resolves the CLI date expressions. A relative end date counts from the
 * explicit start date when there is one, otherwise from today.
 */
export function resolveDateArguments(
  startExpression: string | undefined,
  endExpression: string | undefined,
  today: DateTime = getToday(),
): ResolvedDateArguments {
  const startOverride = startExpression ? resolveDateExpression(startExpression, today) : undefined;
  const endOverride = endExpression ? resolveDateExpression(endExpression, startOverride ?? today) : undefined;
  return { startOverride, endOverride };
}

export interface RunScheduleGenerationOptions {
  configPath: string;
  startDate?: string;
  endDate?: string;
  generateIcs?: boolean;
  outputRoot?: string;
  today?: DateTime;
  generatedAt?: DateTime;
}

export interface ScheduleGenerationSummary {
  scheduleName: string;
  range: DateRange;
  totalShifts: number;
  totalPeople: number;
  spreadsheetPath: string;
  timelinePath?: string;
  calendarFeedPaths: string[];
}

/**
 * Loads a config file, generates the schedule and writes every export into
 * `<outputRoot>/<config basename>/`.
 *
 * @throws NoShiftsProducedError when the config is valid but yields no shifts;
 *         nothing is written in that case
 */
export async function runScheduleGeneration(options: RunScheduleGenerationOptions): Promise<ScheduleGenerationSummary> {
  const today = options.today ?? getToday();
  const generatedAt = options.generatedAt ?? DateTime.local();

  const { startOverride, endOverride } = resolveDateArguments(options.startDate, options.endDate, today);
  if (startOverride) {
    logger.info(`Start date: ${startOverride.toISODate()} (${options.startDate})`);
  }
  if (endOverride) {
    logger.info(`End date: ${endOverride.toISODate()} (${options.endDate})`);
  }

  const config = loadScheduleConfig(options.configPath);
  const { schedule, warning } = generateSchedule(config, { startOverride, endOverride, today });

  if (warning) {
    logger.warn(warning.message, { start: warning.start, end: warning.end });
  }

  printScheduleDiagnostics(schedule);

  if (schedule.shifts.length === 0) {
    throw new NoShiftsProducedError(schedule.name, schedule.layerCount);
  }

  const configName = basename(options.configPath, extname(options.configPath));
  const outputDir = join(options.outputRoot ?? SCHEDULE_OUTPUT_ROOT, configName);
  mkdirSync(outputDir, { recursive: true });

  const spreadsheetPath = await exportSpreadsheet(schedule, join(outputDir, `${configName}.xlsx`), generatedAt);
  logger.info(`✓ On-call schedule spreadsheet generated: ${spreadsheetPath}`);

  let timelinePath: string | undefined;
  if (DISABLE_TIMELINE_EXPORT) {
    logger.info('Timeline export disabled, skipping SVG');
  } else {
    timelinePath = exportTimeline(schedule, join(outputDir, `${configName}.svg`)) ?? undefined;
  }

  const calendarFeedPaths = options.generateIcs ? exportCalendarFeeds(schedule, outputDir, generatedAt) : [];

  return {
    scheduleName: schedule.name,
    range: schedule.range,
    totalShifts: schedule.shifts.length,
    totalPeople: schedule.personColors.size,
    spreadsheetPath,
    timelinePath,
    calendarFeedPaths,
  };
}
