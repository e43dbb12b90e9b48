/**
 * Rotation schedule types.
 *
 * Dates are carried as `yyyy-MM-dd` strings and clock times as `HH:MM`
 * strings, so lexical comparison matches chronological order for both.
 */
export enum Weekday {
  Monday = 'monday',
  Tuesday = 'tuesday',
  Wednesday = 'wednesday',
  Thursday = 'thursday',
  Friday = 'friday',
  Saturday = 'saturday',
  Sunday = 'sunday',
}

export interface TimeWindow {
  start: string;
  end: string;
  /** Present in the config for completeness but never scheduled */
  dummy: boolean;
}

export interface LayerDefinition {
  id: string;
  name: string;
  timeWindows: Partial<Record<Weekday, TimeWindow>>;
  /** Order defines rotation priority */
  rotationTeam: readonly string[];
  /** Suppresses every shift of the layer, whatever the window flags say */
  dummy: boolean;
}

export interface ScheduleConfig {
  name: string;
  description: string;
  startDate?: string;
  durationMonths: number;
  /** In declaration order */
  layers: LayerDefinition[];
}

/** Start inclusive, end exclusive */
export interface DateRange {
  start: string;
  end: string;
}

export interface EnumeratedDate {
  date: string;
  weekday: Weekday;
}

export interface ResolvedShift {
  date: string;
  weekday: Weekday;
  layerId: string;
  layerName: string;
  startTime: string;
  endTime: string;
  person: string;
  /** Tiebreak source only, never a key */
  layerIndex: number;
}

export type SuppressionReason = 'layer_dummy' | 'window_dummy';

/**
 * Outcome of the rotation policy for one enumerated date. Suppressed slots
 * still consumed a rotation position.
 */
export type RotationSlot =
  | { status: 'active'; position: number; shift: ResolvedShift }
  | { status: 'suppressed'; position: number; date: string; weekday: Weekday; person: string; reason: SuppressionReason };

/** A run of consecutive shifts in the aggregated schedule sharing one date */
export interface DateGroup {
  date: string;
  weekday: Weekday;
  shifts: ResolvedShift[];
}

/** Person name → palette color, in order of first appearance */
export type PersonColorMap = Map<string, string>;

export interface GeneratedSchedule {
  name: string;
  description: string;
  range: DateRange;
  layerCount: number;
  shifts: ResolvedShift[];
  days: DateGroup[];
  personColors: PersonColorMap;
}
