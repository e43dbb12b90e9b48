import { DateTime } from 'luxon';
import { combineDateAndTime } from '../utils/date.js';
import { groupShiftsByPerson } from '../schedule/schedule.aggregation.js';
import type { ResolvedShift } from '../schedule/schedule.types.js';

/** Compact local timestamp used in UIDs and ICS date-times */
export const ICS_LOCAL_TIMESTAMP_FORMAT = "yyyyMMdd'T'HHmmss";

const UID_DOMAIN = 'oncall@rotation-scheduler';

export interface CalendarEvent {
  uid: string;
  person: string;
  layerId: string;
  layerName: string;
  start: DateTime;
  end: DateTime;
  /** Generation time; not part of any idempotence guarantee */
  createdAt: DateTime;
}

export interface MaterializeEventsOptions {
  generatedAt?: DateTime;
}

/**
 * Stable for the same shift across runs: depends only on the start
 * timestamp, the person and the layer.
 */
export function buildEventUid(start: DateTime, person: string, layerId: string): string {
  const personPart = person.trim().replace(/\s+/g, '-');
  const layerPart = layerId.trim().replace(/\s+/g, '-');
  return `${start.toFormat(ICS_LOCAL_TIMESTAMP_FORMAT)}-${personPart}-${layerPart}-${UID_DOMAIN}`;
}

export function toCalendarEvent(shift: ResolvedShift, createdAt: DateTime): CalendarEvent {
  const start = combineDateAndTime(shift.date, shift.startTime);
  const end = combineDateAndTime(shift.date, shift.endTime);

  return {
    uid: buildEventUid(start, shift.person, shift.layerId),
    person: shift.person,
    layerId: shift.layerId,
    layerName: shift.layerName,
    start,
    end,
    createdAt,
  };
}

/**
 * One event per shift, grouped by person in order of first appearance.
 * Consecutive shifts of the same person are never merged.
 */
export function materializeCalendarEvents(
  schedule: readonly ResolvedShift[],
  options: MaterializeEventsOptions = {},
): Map<string, CalendarEvent[]> {
  const createdAt = options.generatedAt ?? DateTime.local();
  const eventsByPerson = new Map<string, CalendarEvent[]>();

  for (const [person, shifts] of groupShiftsByPerson(schedule)) {
    eventsByPerson.set(
      person,
      shifts.map((shift) => toCalendarEvent(shift, createdAt)),
    );
  }

  return eventsByPerson;
}
