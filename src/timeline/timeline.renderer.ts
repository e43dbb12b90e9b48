import { capitalize } from 'lodash-es';
import { FALLBACK_PERSON_COLOR } from '../constants.js';
import { Logger } from '../logger.js';
import { writeFileAtomic } from '../utils/files.js';
import type { DateRange, GeneratedSchedule, PersonColorMap } from '../schedule/schedule.types.js';
import { computeTimelineLayout, type TimelineLayout } from './timeline.layout.js';

const logger = new Logger('timeline-renderer');

const COLUMN_WIDTH = 90;
const BAR_WIDTH = 72;
const HOUR_HEIGHT = 48;
const MARGIN_LEFT = 64;
const MARGIN_TOP = 96;
const MARGIN_BOTTOM = 24;
const LEGEND_WIDTH = 200;
const LEGEND_ROW_HEIGHT = 20;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function formatHour(hour: number): string {
  return `${String(hour).padStart(2, '0')}:00`;
}

/**
 * Renders a ready layout as an SVG document: one column per date, earlier
 * hours at the top, bars filled with each person's color.
 */
export function renderTimelineSvg(
  layout: Extract<TimelineLayout, { kind: 'ready' }>,
  personColors: PersonColorMap,
  title: string,
): string {
  const plotWidth = layout.columns.length * COLUMN_WIDTH;
  const plotHeight = (layout.maxHour - layout.minHour) * HOUR_HEIGHT;
  const legendPeople = [...personColors.keys()].sort();
  const width = MARGIN_LEFT + plotWidth + LEGEND_WIDTH;
  const height = Math.max(
    MARGIN_TOP + plotHeight + MARGIN_BOTTOM,
    MARGIN_TOP + (legendPeople.length + 1) * LEGEND_ROW_HEIGHT,
  );
  const yFor = (hour: number) => MARGIN_TOP + (hour - layout.minHour) * HOUR_HEIGHT;

  const elements: string[] = [
    `<rect x="0" y="0" width="${width}" height="${height}" fill="#FFFFFF"/>`,
    `<text x="${width / 2}" y="24" text-anchor="middle" font-size="16" font-weight="bold">${escapeXml(title)}</text>`,
  ];

  for (let hour = layout.minHour; hour <= layout.maxHour; hour++) {
    const y = yFor(hour);
    elements.push(
      `<line x1="${MARGIN_LEFT}" y1="${y}" x2="${MARGIN_LEFT + plotWidth}" y2="${y}" stroke="#BBBBBB" stroke-dasharray="4 4"/>`,
      `<text x="${MARGIN_LEFT - 8}" y="${y + 4}" text-anchor="end" font-size="11">${formatHour(hour)}</text>`,
    );
  }

  for (const column of layout.columns) {
    const centerX = MARGIN_LEFT + column.slot * COLUMN_WIDTH + COLUMN_WIDTH / 2;
    const dayLabel = capitalize(column.weekday.slice(0, 3));
    elements.push(
      `<text x="${centerX}" y="${MARGIN_TOP - 28}" text-anchor="middle" font-size="10" font-weight="bold">${column.date}</text>`,
      `<text x="${centerX}" y="${MARGIN_TOP - 14}" text-anchor="middle" font-size="10" font-weight="bold">${dayLabel}</text>`,
    );

    for (const bar of column.bars) {
      const top = yFor(bar.startHour);
      const barHeight = (bar.endHour - bar.startHour) * HOUR_HEIGHT;
      const color = personColors.get(bar.person) ?? FALLBACK_PERSON_COLOR;
      elements.push(
        `<rect x="${centerX - BAR_WIDTH / 2}" y="${top}" width="${BAR_WIDTH}" height="${barHeight}" fill="#${color}" stroke="#000000"/>`,
        `<text x="${centerX}" y="${top + barHeight / 2 + 3}" text-anchor="middle" font-size="9" font-weight="bold">${escapeXml(bar.person)}</text>`,
      );
    }
  }

  const legendX = MARGIN_LEFT + plotWidth + 24;
  elements.push(`<text x="${legendX}" y="${MARGIN_TOP}" font-size="12" font-weight="bold">Team Members</text>`);
  legendPeople.forEach((person, index) => {
    const y = MARGIN_TOP + (index + 1) * LEGEND_ROW_HEIGHT;
    const color = personColors.get(person) ?? FALLBACK_PERSON_COLOR;
    elements.push(
      `<rect x="${legendX}" y="${y - 11}" width="14" height="14" fill="#${color}" stroke="#000000"/>`,
      `<text x="${legendX + 20}" y="${y}" font-size="11">${escapeXml(person)}</text>`,
    );
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="sans-serif">`,
    ...elements.map((element) => `  ${element}`),
    '</svg>',
    '',
  ].join('\n');
}

/**
 * Writes the timeline for the presentation window (the whole schedule range
 * by default). Returns null and writes nothing when the window has no shifts.
 */
export function exportTimeline(schedule: GeneratedSchedule, outputFile: string, window: DateRange = schedule.range): string | null {
  const layout = computeTimelineLayout(schedule.shifts, window);
  if (layout.kind === 'empty') {
    logger.warn('No shifts to visualize');
    return null;
  }

  const title = `${schedule.name} (${window.start} to ${window.end})`;
  writeFileAtomic(outputFile, renderTimelineSvg(layout, schedule.personColors, title));

  logger.info(`✓ Visual schedule generated: ${outputFile}`, { columns: layout.columns.length });
  return outputFile;
}
