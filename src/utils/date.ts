import {
  differenceInCalendarDays,
  eachDayOfInterval,
  format,
  isValid,
  parse,
} from 'date-fns';

import type { CivilDate } from '../types/vacation.js';

/**
 * Date utility functions for vacation bookkeeping
 *
 * All vacation dates are civil dates (`YYYY-MM-DD`) with no time zone. They
 * are parsed to local midnight only for calendar arithmetic and formatted
 * straight back, so the host time zone never leaks into stored values.
 * Because the format is fixed-width, civil dates compare correctly as strings.
 *
 * @module utils/date
 */

const CIVIL_DATE_FORMAT = 'yyyy-MM-dd';
const CIVIL_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Inclusive civil-date range
 */
export interface DateRange {
  readonly start: CivilDate;
  readonly end: CivilDate;
}

/**
 * Parse a civil date string
 *
 * Only the exact `YYYY-MM-DD` form is accepted, and only for days that exist
 * on the calendar.
 *
 * @example
 * parseCivilDate('2024-02-29'); // Date (local midnight)
 * parseCivilDate('2023-02-29'); // null
 * parseCivilDate('2024-2-1');   // null
 */
export function parseCivilDate(value: string): Date | null {
  if (!CIVIL_DATE_PATTERN.test(value)) {
    return null;
  }

  const parsed = parse(value, CIVIL_DATE_FORMAT, new Date(2000, 0, 1));

  if (!isValid(parsed) || format(parsed, CIVIL_DATE_FORMAT) !== value) {
    return null;
  }

  return parsed;
}

/**
 * Type guard for civil date strings
 */
export function isCivilDate(value: unknown): value is CivilDate {
  return typeof value === 'string' && parseCivilDate(value) !== null;
}

/**
 * Format a Date as a civil date using its local calendar day
 *
 * @throws {Error} If date is invalid
 */
export function formatCivilDate(date: Date): CivilDate {
  if (!isValid(date)) {
    throw new Error('Invalid date provided');
  }

  return format(date, CIVIL_DATE_FORMAT);
}

/**
 * Today's civil date in the host's local calendar
 */
export function todayCivilDate(): CivilDate {
  return formatCivilDate(new Date());
}

function requireCivilDate(value: CivilDate, label: string): Date {
  const parsed = parseCivilDate(value);
  if (!parsed) {
    throw new Error(`Invalid ${label} date provided: ${value}`);
  }
  return parsed;
}

/**
 * Enumerate every calendar day in an inclusive range, in increasing order
 *
 * @example
 * eachCivilDay('2024-02-28', '2024-03-01');
 * // ['2024-02-28', '2024-02-29', '2024-03-01']
 *
 * @throws {Error} If either date is invalid or start is after end
 */
export function eachCivilDay(startDate: CivilDate, endDate: CivilDate): CivilDate[] {
  const start = requireCivilDate(startDate, 'start');
  const end = requireCivilDate(endDate, 'end');

  if (start > end) {
    throw new Error(`Start date ${startDate} is after end date ${endDate}`);
  }

  return eachDayOfInterval({ start, end }).map((day) => format(day, CIVIL_DATE_FORMAT));
}

/**
 * Calculate the number of days in an inclusive range
 *
 * @example
 * calculateDaysBetween('2024-01-01', '2024-01-01'); // 1
 * calculateDaysBetween('2024-02-01', '2024-02-03'); // 3
 *
 * @throws {Error} If either date is invalid
 */
export function calculateDaysBetween(startDate: CivilDate, endDate: CivilDate): number {
  const start = requireCivilDate(startDate, 'start');
  const end = requireCivilDate(endDate, 'end');

  return differenceInCalendarDays(end, start) + 1;
}

/**
 * Check if a day falls within an inclusive range
 */
export function isDateInRange(date: CivilDate, range: DateRange): boolean {
  return range.start <= date && date <= range.end;
}

/**
 * Comparator for sorting civil dates in ascending order
 */
export function compareCivilDates(a: CivilDate, b: CivilDate): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
