import ExcelJS, { type Alignment, type Borders, type Fill, type Font, type Workbook, type Worksheet } from 'exceljs';
import { capitalize } from 'lodash-es';
import { DateTime } from 'luxon';
import { FALLBACK_PERSON_COLOR, NAIVE_ZONE } from '../constants.js';
import { Logger } from '../logger.js';
import { writeFileAtomic } from '../utils/files.js';
import { getShiftHours } from '../schedule/schedule.utils.js';
import type { GeneratedSchedule, ResolvedShift } from '../schedule/schedule.types.js';

const logger = new Logger('spreadsheet-exporter');

export const WORKSHEET_NAME = 'On-Call Schedule';

export const COLUMN_HEADERS = [
  'Date',
  'Day',
  'Start Time',
  'End Time',
  'Hours',
  'On-Call Person',
  'On-Call Status',
] as const;

const COLUMN_WIDTHS = [15, 12, 12, 12, 8, 20, 15];

/** Row of the column headers; rows 1-4 hold the title block */
export const HEADER_ROW = 6;

const HEADER_COLOR = '1F4788';

const THIN_BORDER: Partial<Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' },
};

const CENTER_ALIGNMENT: Partial<Alignment> = { horizontal: 'center', vertical: 'middle', wrapText: true };

function solidFill(color: string): Fill {
  return { type: 'pattern', pattern: 'solid', fgColor: { argb: `FF${color}` } };
}

function writeTitleRow(worksheet: Worksheet, rowNumber: number, value: string, font: Partial<Font>) {
  worksheet.mergeCells(rowNumber, 1, rowNumber, COLUMN_HEADERS.length);
  const cell = worksheet.getCell(rowNumber, 1);
  cell.value = value;
  cell.font = font;
  cell.alignment = CENTER_ALIGNMENT;
  return cell;
}

function writeShiftRow(worksheet: Worksheet, rowNumber: number, shift: ResolvedShift, color: string) {
  const row = worksheet.getRow(rowNumber);
  row.getCell(1).value = DateTime.fromISO(shift.date, { zone: NAIVE_ZONE }).toJSDate();
  row.getCell(2).value = capitalize(shift.weekday);
  row.getCell(3).value = shift.startTime;
  row.getCell(4).value = shift.endTime;
  row.getCell(5).value = {
    formula: `(D${rowNumber}-C${rowNumber})*24`,
    result: getShiftHours(shift),
    date1904: false,
  };
  row.getCell(6).value = shift.person;
  row.getCell(7).value = {
    formula: `IF(AND(NOW()>=A${rowNumber}+C${rowNumber},NOW()<=A${rowNumber}+D${rowNumber}),"On-Call","")`,
    date1904: false,
  };

  for (let column = 1; column <= COLUMN_HEADERS.length; column++) {
    const cell = row.getCell(column);
    cell.border = THIN_BORDER;
    cell.alignment = CENTER_ALIGNMENT;
    cell.fill = solidFill(color);
  }

  row.getCell(1).numFmt = 'yyyy-mm-dd';
  row.getCell(5).numFmt = '0.0';
}

/**
 * Lays the schedule out as one worksheet: a title block, the column headers,
 * then one row per shift in canonical order with a blank row between dates.
 */
export function buildScheduleWorkbook(schedule: GeneratedSchedule, generatedAt: DateTime): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = generatedAt.toJSDate();
  const worksheet = workbook.addWorksheet(WORKSHEET_NAME);

  const titleCell = writeTitleRow(worksheet, 1, schedule.name, { bold: true, color: { argb: 'FFFFFFFF' }, size: 14 });
  titleCell.fill = solidFill(HEADER_COLOR);
  writeTitleRow(worksheet, 2, schedule.description, { italic: true });
  writeTitleRow(worksheet, 3, `Period: ${schedule.range.start} to ${schedule.range.end}`, { bold: true });
  writeTitleRow(worksheet, 4, `Generated: ${generatedAt.toFormat('yyyy-MM-dd HH:mm')}`, { size: 9, italic: true });

  const headerRow = worksheet.getRow(HEADER_ROW);
  COLUMN_HEADERS.forEach((header, index) => {
    const cell = headerRow.getCell(index + 1);
    cell.value = header;
    cell.fill = solidFill(HEADER_COLOR);
    cell.font = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };
    cell.border = THIN_BORDER;
    cell.alignment = CENTER_ALIGNMENT;
  });

  let rowNumber = HEADER_ROW + 1;
  schedule.days.forEach((day, dayIndex) => {
    if (dayIndex > 0) {
      rowNumber++; // separator between dates
    }
    for (const shift of day.shifts) {
      writeShiftRow(worksheet, rowNumber, shift, schedule.personColors.get(shift.person) ?? FALLBACK_PERSON_COLOR);
      rowNumber++;
    }
  });

  COLUMN_WIDTHS.forEach((width, index) => {
    worksheet.getColumn(index + 1).width = width;
  });

  return workbook;
}

export async function exportSpreadsheet(
  schedule: GeneratedSchedule,
  outputFile: string,
  generatedAt: DateTime,
): Promise<string> {
  const workbook = buildScheduleWorkbook(schedule, generatedAt);
  const buffer = await workbook.xlsx.writeBuffer();
  writeFileAtomic(outputFile, new Uint8Array(buffer));

  logger.debug(`Wrote ${schedule.shifts.length} shift rows`, { outputFile });
  return outputFile;
}
