/**
 * CE Requirements Module - Period Resolver
 *
 * Derives the active reporting window for a period rule and its anchor data.
 * Every window is computed from the supplied "now"; nothing is persisted.
 */

import { addYears, differenceInCalendarDays, startOfDay, subDays } from 'date-fns';

import { calendarDate, toIsoDate, utcCalendarDay } from './dates.js';

import type { ReportingPeriod } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * How a designation's reporting window is anchored.
 */
export type PeriodRule =
  /** Two years starting on the 1st of the holder's birth month */
  | { kind: 'birth-month-biennial' }
  /** Jan 1 - Dec 31 of the current year */
  | { kind: 'calendar-year' }
  /** Fixed calendar cycles whose start year is a multiple of `years` */
  | { kind: 'fixed-multiyear'; years: number }
  /** Two calendar years starting on an odd year */
  | { kind: 'odd-year-biennial' }
  /** Two years from the designation's anniversary; open periods end today */
  | { kind: 'anniversary-biennial' };

export type PeriodRuleKind = PeriodRule['kind'];

export interface PeriodAnchors {
  /** 1-12; required by birth-month-biennial */
  birthMonth: number | null;
  /** Instant the designation was granted, read by its UTC day; anniversary-biennial falls back to now */
  anchorDate: Date | null;
}

const DAYS_PER_YEAR = 365.25;

// ─────────────────────────────────────────────────────────────────────────────
// Rule Implementations
// ─────────────────────────────────────────────────────────────────────────────

function resolveBirthMonthBiennial(birthMonth: number | null, now: Date): ReportingPeriod | null {
  if (birthMonth === null || !Number.isInteger(birthMonth) || birthMonth < 1 || birthMonth > 12) {
    return null;
  }

  const year = now.getFullYear();
  const month = now.getMonth() + 1;
  const startYear = month < birthMonth ? year - 2 : year - 1;
  const nextStart = new Date(startYear + 2, birthMonth - 1, 1);

  return {
    start: calendarDate(startYear, birthMonth, 1),
    end: toIsoDate(subDays(nextStart, 1)),
  };
}

function resolveFixedMultiyear(years: number, now: Date): ReportingPeriod {
  const cycleStartYear = Math.floor(now.getFullYear() / years) * years;
  return {
    start: calendarDate(cycleStartYear, 1, 1),
    end: calendarDate(cycleStartYear + years - 1, 12, 31),
  };
}

function resolveOddYearBiennial(now: Date): ReportingPeriod {
  const year = now.getFullYear();
  const cycleStartYear = year % 2 === 0 ? year - 1 : year;
  return {
    start: calendarDate(cycleStartYear, 1, 1),
    end: calendarDate(cycleStartYear + 1, 12, 31),
  };
}

function resolveAnniversaryBiennial(anchorDate: Date | null, now: Date): ReportingPeriod {
  const today = startOfDay(now);
  const anchor = anchorDate !== null ? utcCalendarDay(anchorDate) : today;

  const yearsSince = differenceInCalendarDays(today, anchor) / DAYS_PER_YEAR;
  const periodNumber = Math.floor(yearsSince / 2);

  const start = addYears(anchor, periodNumber * 2);
  const theoreticalEnd = subDays(addYears(anchor, (periodNumber + 1) * 2), 1);
  const end = theoreticalEnd > today ? today : theoreticalEnd;

  return {
    start: toIsoDate(start),
    end: toIsoDate(end),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The calendar year containing `now`.
 */
export function resolveCalendarYear(now: Date): ReportingPeriod {
  const year = now.getFullYear();
  return {
    start: calendarDate(year, 1, 1),
    end: calendarDate(year, 12, 31),
  };
}

/**
 * Resolves the reporting window active at `now`.
 * Returns null when the rule needs anchor data that is missing or out of range.
 */
export function resolvePeriod(
  rule: PeriodRule,
  anchors: PeriodAnchors,
  now: Date
): ReportingPeriod | null {
  switch (rule.kind) {
    case 'birth-month-biennial':
      return resolveBirthMonthBiennial(anchors.birthMonth, now);
    case 'calendar-year':
      return resolveCalendarYear(now);
    case 'fixed-multiyear':
      return resolveFixedMultiyear(rule.years, now);
    case 'odd-year-biennial':
      return resolveOddYearBiennial(now);
    case 'anniversary-biennial':
      return resolveAnniversaryBiennial(anchors.anchorDate, now);
  }
}

/**
 * NAPFA's two-year cycle starts on even years.
 */
export function resolveNapfaCycle(now: Date): ReportingPeriod & {
  startYear: number;
  endYear: number;
} {
  const year = now.getFullYear();
  const startYear = year % 2 === 0 ? year : year - 1;
  const endYear = startYear + 1;
  return {
    start: calendarDate(startYear, 1, 1),
    end: calendarDate(endYear, 12, 31),
    startYear,
    endYear,
  };
}

