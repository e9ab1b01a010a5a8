import { ValidationError } from '../errors';

export type CalendarMonth = {
  year: number;
  month: number;
};

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MONTH_PATTERN = /^(\d{4})-(\d{2})(?:-01)?$/;

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

export function parseIsoDate(value: string): CalendarMonth & { day: number } {
  if (!isIsoDate(value)) {
    throw new ValidationError(`invalid date '${value}', expected YYYY-MM-DD`, 'INVALID_DATE_RANGE');
  }
  const [year, month, day] = value.split('-').map((part) => Number(part));
  return { year, month, day };
}

/** Accepts `YYYY-MM` or the first day of a month, `YYYY-MM-01`. */
export function parseMonth(value: string): CalendarMonth {
  const match = MONTH_PATTERN.exec(value.trim());
  const month = match ? Number(match[2]) : 0;
  if (!match || month < 1 || month > 12) {
    throw new ValidationError(`invalid month '${value}', expected YYYY-MM`, 'INVALID_DATE_RANGE');
  }
  return { year: Number(match[1]), month };
}

export function monthFromDate(value: string): CalendarMonth {
  const { year, month } = parseIsoDate(value);
  return { year, month };
}

/** `2023-01-01`: the value stored in `area_timeseries.month`. */
export function monthToDate({ year, month }: CalendarMonth): string {
  return `${year}-${pad2(month)}-01`;
}

/** `2023_01`: the month segment of raster and tile keys. */
export function monthToSegment({ year, month }: CalendarMonth): string {
  return `${year}_${pad2(month)}`;
}

export function nextMonth({ year, month }: CalendarMonth): CalendarMonth {
  return month === 12 ? { year: year + 1, month: 1 } : { year, month: month + 1 };
}

export function compareMonths(a: CalendarMonth, b: CalendarMonth): number {
  return a.year === b.year ? a.month - b.month : a.year - b.year;
}

/**
 * Calendar months intersecting the half-open range `[startDate, endDate)`.
 * Without an end date only the month of `startDate` is covered.
 */
export function monthsInRange(startDate: string, endDate: string | null): CalendarMonth[] {
  const start = parseIsoDate(startDate);
  if (endDate === null) {
    return [{ year: start.year, month: start.month }];
  }
  if (!isIsoDate(endDate)) {
    throw new ValidationError(`invalid end date '${endDate}', expected YYYY-MM-DD`, 'INVALID_DATE_RANGE');
  }
  if (endDate <= startDate) {
    throw new ValidationError(`end date ${endDate} must be after start date ${startDate}`, 'INVALID_DATE_RANGE');
  }

  const months: CalendarMonth[] = [];
  let cursor: CalendarMonth = { year: start.year, month: start.month };
  while (monthToDate(cursor) < endDate) {
    months.push(cursor);
    cursor = nextMonth(cursor);
  }
  return months;
}
