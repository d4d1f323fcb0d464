/**
 * CE Requirements Module - Requirement Aggregator
 *
 * Pure functions that turn a record set and a period into progress figures.
 * Sub-requirement hours are not carved out of the total: a record that
 * matches a sub-requirement counts toward both.
 */

import { Decimal } from 'decimal.js';

import { isWithinPeriod } from './dates.js';

import type {
  CeRecord,
  ReportingPeriod,
  RequirementProgress,
  SubRequirementKey,
  SubRequirementResult,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type RecordPredicate = (record: CeRecord) => boolean;

/**
 * A sub-requirement evaluated over a concrete window.
 */
export interface ResolvedSubRequirement {
  key: SubRequirementKey;
  label: string;
  required: number;
  matches: RecordPredicate;
  period: ReportingPeriod;
}

export interface AggregateRequirementInput {
  records: readonly CeRecord[];
  period: ReportingPeriod;
  totalRequired: number;
  subRequirements: readonly ResolvedSubRequirement[];
}

export interface AggregateRequirementOutput {
  total: RequirementProgress;
  subRequirements: SubRequirementResult[];
  isComplete: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Predicates
// ─────────────────────────────────────────────────────────────────────────────

const ETHICS_KEYWORD = 'ethics';

/**
 * Free-text ethics detection used by designation calculators.
 * Case-insensitive substring match on category or title.
 */
export const mentionsEthics: RecordPredicate = (record) =>
  (record.category ?? '').toLowerCase().includes(ETHICS_KEYWORD) ||
  record.title.toLowerCase().includes(ETHICS_KEYWORD);

export const isNapfaApproved: RecordPredicate = (record) => record.isNapfaApproved;

export const isEthicsCourse: RecordPredicate = (record) => record.isEthicsCourse;

export const anyRecord: RecordPredicate = () => true;

// ─────────────────────────────────────────────────────────────────────────────
// Arithmetic
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sums record hours without binary floating point drift.
 */
export function sumHours(records: readonly CeRecord[]): number {
  return records
    .reduce((acc, record) => acc.plus(record.hours), new Decimal(0))
    .toNumber();
}

/**
 * Derives remaining hours and a clamped percentage.
 * A zero requirement reports 0%.
 */
export function computeProgress(required: number, earned: number): RequirementProgress {
  const requiredDec = new Decimal(required);
  const earnedDec = new Decimal(earned);

  const remaining = Decimal.max(0, requiredDec.minus(earnedDec));
  const percentage = requiredDec.isZero()
    ? new Decimal(0)
    : Decimal.min(100, Decimal.max(0, earnedDec.div(requiredDec).mul(100)));

  return {
    required,
    earned,
    remaining: remaining.toNumber(),
    percentage: percentage.toNumber(),
  };
}

export function isMet(progress: RequirementProgress): boolean {
  return progress.earned >= progress.required;
}

export function recordsWithin(
  records: readonly CeRecord[],
  period: ReportingPeriod
): CeRecord[] {
  return records.filter((record) => isWithinPeriod(record.dateCompleted, period));
}

// ─────────────────────────────────────────────────────────────────────────────
// Aggregation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sums total and sub-requirement hours for a period.
 *
 * Records outside `period` are ignored, so callers may pass a superset.
 * Each sub-requirement only sees records inside its own window.
 */
export function aggregateRequirement(input: AggregateRequirementInput): AggregateRequirementOutput {
  const { records, period, totalRequired, subRequirements } = input;

  const inPeriod = recordsWithin(records, period);
  const total = computeProgress(totalRequired, sumHours(inPeriod));

  const subResults = subRequirements.map((sub): SubRequirementResult => {
    const matching = recordsWithin(inPeriod, sub.period).filter(sub.matches);
    return {
      key: sub.key,
      label: sub.label,
      period: sub.period,
      ...computeProgress(sub.required, sumHours(matching)),
    };
  });

  return {
    total,
    subRequirements: subResults,
    isComplete: isMet(total) && subResults.every(isMet),
  };
}
