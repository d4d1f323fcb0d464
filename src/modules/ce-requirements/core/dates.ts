import { format, isValid, parseISO } from 'date-fns';

import type { IsoDate, ReportingPeriod } from './types.js';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Formats the local calendar date of a Date as YYYY-MM-DD.
 */
export function toIsoDate(date: Date): IsoDate {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Parses YYYY-MM-DD into a Date at local midnight.
 */
export function fromIsoDate(value: IsoDate): Date {
  return parseISO(value);
}

/**
 * Builds an ISO date from calendar parts (month is 1-based).
 */
export function calendarDate(year: number, month: number, day: number): IsoDate {
  return toIsoDate(new Date(year, month - 1, day));
}

/**
 * Local midnight of the UTC calendar date of an instant.
 * Timestamps are stored in UTC, so their day is the UTC day.
 */
export function utcCalendarDay(instant: Date): Date {
  return new Date(instant.getUTCFullYear(), instant.getUTCMonth(), instant.getUTCDate());
}

/**
 * Checks a string is a real calendar date in YYYY-MM-DD form.
 * Rejects overflowing days such as 2025-02-30.
 */
export function isIsoDate(value: string): value is IsoDate {
  if (!ISO_DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = parseISO(value);
  return isValid(parsed) && toIsoDate(parsed) === value;
}

/**
 * Inclusive on both bounds. ISO dates compare correctly as strings.
 */
export function isWithinPeriod(date: IsoDate, period: ReportingPeriod): boolean {
  return date >= period.start && date <= period.end;
}
