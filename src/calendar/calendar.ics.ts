import { join } from 'path';
import type { DateTime } from 'luxon';
import { Logger } from '../logger.js';
import { writeFileAtomic } from '../utils/files.js';
import type { GeneratedSchedule } from '../schedule/schedule.types.js';
import { ICS_LOCAL_TIMESTAMP_FORMAT, materializeCalendarEvents, type CalendarEvent } from './calendar.events.js';

const logger = new Logger('calendar-ics');

export const ICS_DIRECTORY_NAME = 'ics_files';
const ALARM_TRIGGER = '-PT15M';
const MAX_LINE_OCTETS = 75;

/**
 * Escape text for iCalendar format
 */
export function escapeICalText(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/;/g, '\\;').replace(/,/g, '\\,').replace(/\n/g, '\\n');
}

/**
 * File name (without extension) for a person's feed. Characters other than
 * letters, digits, spaces, `_` and `-` become `_`, and lone digits are
 * zero-padded so feeds sort naturally (`Utente 1` → `Utente 01`).
 */
export function toCalendarFileName(person: string): string {
  const safe = person.replace(/[^\p{L}\p{N} _-]/gu, '_');
  return safe.replace(/\b(\d)\b/g, '0$1');
}

/**
 * Folds a content line into chunks of at most 75 UTF-8 octets. Continuation
 * lines start with a single space, which counts towards their limit; code
 * points are never split.
 */
export function foldContentLine(line: string): string {
  const chunks: string[] = [];
  let chunk = '';
  let chunkOctets = 0;
  let limit = MAX_LINE_OCTETS;

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf8');
    if (chunkOctets + octets > limit) {
      chunks.push(chunk);
      chunk = '';
      chunkOctets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    chunk += char;
    chunkOctets += octets;
  }
  chunks.push(chunk);

  return chunks.join('\r\n ');
}

function formatEvent(event: CalendarEvent, scheduleName: string): string[] {
  return [
    'BEGIN:VEVENT',
    `UID:${event.uid}`,
    `DTSTAMP:${event.createdAt.toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'")}`,
    `DTSTART:${event.start.toFormat(ICS_LOCAL_TIMESTAMP_FORMAT)}`,
    `DTEND:${event.end.toFormat(ICS_LOCAL_TIMESTAMP_FORMAT)}`,
    `SUMMARY:${escapeICalText(`On-Call: ${event.layerName}`)}`,
    `DESCRIPTION:${escapeICalText(`On-call shift for ${event.person}\nLayer: ${event.layerName}\nSchedule: ${scheduleName}`)}`,
    'LOCATION:On-Call',
    'STATUS:CONFIRMED',
    'TRANSP:OPAQUE',
    'BEGIN:VALARM',
    `TRIGGER:${ALARM_TRIGGER}`,
    'ACTION:DISPLAY',
    'DESCRIPTION:On-Call shift starts in 15 minutes',
    'END:VALARM',
    'END:VEVENT',
  ];
}

/**
 * Serializes one person's events as a VCALENDAR document with folded lines.
 * Times are floating local times (no TZID), matching the naive scheduling model.
 */
export function buildCalendarFeed(person: string, events: readonly CalendarEvent[], scheduleName: string): string {
  const lines = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//Rotation Scheduler//On-Call//EN',
    `X-WR-CALNAME:${escapeICalText(`${person} - On-Call Schedule`)}`,
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
    ...events.flatMap((event) => formatEvent(event, scheduleName)),
    'END:VCALENDAR',
  ];

  return `${lines.map(foldContentLine).join('\r\n')}\r\n`;
}

/**
 * Writes one `.ics` file per person into `<outputDir>/ics_files/`.
 * Returns the written paths in order of each person's first shift.
 */
export function exportCalendarFeeds(schedule: GeneratedSchedule, outputDir: string, generatedAt: DateTime): string[] {
  const icsDir = join(outputDir, ICS_DIRECTORY_NAME);
  const eventsByPerson = materializeCalendarEvents(schedule.shifts, { generatedAt });
  const usedNames = new Set<string>();
  const written: string[] = [];

  for (const [person, events] of eventsByPerson) {
    const baseName = toCalendarFileName(person);
    let fileName = baseName;
    for (let suffix = 2; usedNames.has(fileName); suffix++) {
      fileName = `${baseName}-${suffix}`;
    }
    usedNames.add(fileName);

    const filePath = join(icsDir, `${fileName}.ics`);
    writeFileAtomic(filePath, buildCalendarFeed(person, events, schedule.name));
    logger.debug(`Wrote ${events.length} shifts for ${person}`, { filePath });
    written.push(filePath);
  }

  logger.info(`✓ ICS files generated in: ${icsDir}/`, { files: written.length });
  return written;
}
