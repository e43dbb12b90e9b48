import { existsSync, readFileSync } from 'fs';
import { isMap, isScalar, parseDocument, type Document } from 'yaml';
import { z } from 'zod';
import { DEFAULT_DURATION_MONTHS, DEFAULT_SCHEDULE_NAME } from '../constants.js';
import { Logger } from '../logger.js';
import { parseDateKey } from '../utils/date.js';
import { isWeekday, validateTimeWindow } from '../utils/validation.js';
import { ConfigurationNotFoundError, InvalidConfigurationError } from './schedule.errors.js';
import type { LayerDefinition, ScheduleConfig, TimeWindow, Weekday } from './schedule.types.js';

const logger = new Logger('schedule-config');

const TimeWindowZ = z
  .object({
    start: z.string(),
    end: z.string(),
    dummy: z.boolean().default(false),
  })
  .superRefine((window, ctx) => {
    const validation = validateTimeWindow(window);
    if (!validation.isValid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: validation.error });
    }
  });

const LayerZ = z.object({
  name: z.string().min(1).optional(),
  rotation_team: z
    .array(z.coerce.string())
    .nullish()
    .transform((team) => team ?? []),
  dummy: z.boolean().default(false),
  time_windows: z.record(z.string(), TimeWindowZ).optional(),
  // Legacy form: one window shared by a list of days
  days: z.array(z.string()).optional(),
  time_window: TimeWindowZ.optional(),
});

const ScheduleZ = z.object({
  name: z.string().default(DEFAULT_SCHEDULE_NAME),
  description: z.string().default(''),
  start_date: z
    .string()
    .refine((value) => parseDateKey(value) !== null, 'expected YYYY-MM-DD')
    .optional(),
  duration_months: z.number().int().positive().default(DEFAULT_DURATION_MONTHS),
  layers: z.record(z.string(), LayerZ).default({}),
});

const ConfigFileZ = z.object({
  schedule: ScheduleZ,
});

type RawLayer = z.infer<typeof LayerZ>;

/**
 * Loads and validates a schedule YAML file.
 *
 * @throws ConfigurationNotFoundError when the file does not exist
 * @throws InvalidConfigurationError for unparsable YAML, a missing `schedule` key,
 *         invalid field values or a config with no layers
 */
export function loadScheduleConfig(configPath: string): ScheduleConfig {
  if (!existsSync(configPath)) {
    throw new ConfigurationNotFoundError(configPath);
  }

  const yamlDocument = parseDocument(readFileSync(configPath, 'utf-8'));
  const [parseError] = yamlDocument.errors;
  if (parseError) {
    throw new InvalidConfigurationError(`Could not parse ${configPath}: ${parseError.message}`);
  }

  const document: unknown = yamlDocument.toJS();
  return parseScheduleConfig(document, readLayerOrder(yamlDocument));
}

/**
 * Layer ids as written in the file. Plain objects list integer-like keys
 * first, so the mapping's own item order is the declaration order.
 */
function readLayerOrder(yamlDocument: Document): string[] | undefined {
  const layers = yamlDocument.getIn(['schedule', 'layers']);
  if (!isMap(layers)) {
    return undefined;
  }
  return layers.items.map((pair) => String(isScalar(pair.key) ? pair.key.value : pair.key));
}

/**
 * Validates an already-parsed config document. `layerOrder` lists layer ids in
 * declaration order; without it the order of `Object.keys` is used.
 */
export function parseScheduleConfig(document: unknown, layerOrder?: readonly string[]): ScheduleConfig {
  if (document === null || typeof document !== 'object' || !('schedule' in document)) {
    throw new InvalidConfigurationError("Invalid configuration file: missing 'schedule' key");
  }

  const result = ConfigFileZ.safeParse(document);
  if (!result.success) {
    throw new InvalidConfigurationError(
      'Invalid configuration file',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const { schedule } = result.data;
  const layerIds = layerOrder ?? Object.keys(schedule.layers);
  const layers = layerIds.flatMap((id) => {
    const layer = schedule.layers[id];
    return layer ? [toLayerDefinition(id, layer)] : [];
  });

  if (layers.length === 0) {
    throw new InvalidConfigurationError('No layers defined in configuration file');
  }

  return {
    name: schedule.name,
    description: schedule.description,
    startDate: schedule.start_date,
    durationMonths: schedule.duration_months,
    layers,
  };
}

function toLayerDefinition(id: string, layer: RawLayer): LayerDefinition {
  const timeWindows: Partial<Record<Weekday, TimeWindow>> = {};

  if (layer.time_windows) {
    for (const [day, window] of Object.entries(layer.time_windows)) {
      addWindow(timeWindows, id, day, window);
    }
  } else if (layer.days && layer.time_window) {
    for (const day of layer.days) {
      addWindow(timeWindows, id, day, layer.time_window);
    }
  } else if (layer.days) {
    throw new InvalidConfigurationError(`Layer "${id}" lists days but has no time_window`);
  }

  return {
    id,
    name: layer.name ?? id,
    timeWindows,
    rotationTeam: layer.rotation_team,
    dummy: layer.dummy,
  };
}

function addWindow(timeWindows: Partial<Record<Weekday, TimeWindow>>, layerId: string, day: string, window: TimeWindow) {
  const weekday = day.trim().toLowerCase();
  if (!isWeekday(weekday)) {
    logger.warn(`Ignoring unknown weekday "${day}" in layer "${layerId}"`);
    return;
  }
  timeWindows[weekday] = { ...window };
}
