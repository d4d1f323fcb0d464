/**
 * CE Requirements Module - Designation Calculators
 *
 * Turns each declarative designation rule into a calculator with a uniform
 * signature. The dispatch table is built once when the module loads.
 */

import { ok, err, type Result } from 'neverthrow';

import { aggregateRequirement, type ResolvedSubRequirement } from './aggregator.js';
import {
  DESIGNATION_RULES,
  hasDesignationRule,
  type DesignationRule,
} from './designation-rules.js';
import { resolveCalendarYear, resolvePeriod } from './periods.js';

import type { CeRequirementsError } from './errors.js';
import type { CeRecordRepository } from './ports.js';
import type {
  CalculatedDesignation,
  CeTrackingUser,
  DesignationRequirementResult,
  ReportingPeriod,
  UserDesignation,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface DesignationCalculatorDeps {
  ceRecordRepo: CeRecordRepository;
}

export interface DesignationCalculatorInput {
  user: CeTrackingUser;
  userDesignation: UserDesignation;
  /** Reference instant; its local calendar date is "today" */
  now: Date;
}

/**
 * Resolves to null when the assignment is for a different designation or
 * lacks the anchor data its period rule needs.
 */
export type DesignationCalculator = (
  deps: DesignationCalculatorDeps,
  input: DesignationCalculatorInput
) => Promise<Result<DesignationRequirementResult | null, CeRequirementsError>>;

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

function subRequirementSpecs(
  rule: DesignationRule,
  period: ReportingPeriod,
  now: Date
): ResolvedSubRequirement[] {
  return rule.subRequirements.map((sub) => ({
    key: sub.key,
    label: sub.label,
    required: sub.required,
    matches: sub.matches,
    period: sub.window === 'current-year' ? resolveCalendarYear(now) : period,
  }));
}

/**
 * Builds the calculator for a designation rule.
 */
export function makeDesignationCalculator(rule: DesignationRule): DesignationCalculator {
  return async (deps, input) => {
    const { user, userDesignation, now } = input;

    if (userDesignation.designation !== rule.code) {
      return ok(null);
    }

    const period = resolvePeriod(
      rule.period,
      { birthMonth: userDesignation.birthMonth, anchorDate: userDesignation.createdAt },
      now
    );
    if (period === null) {
      return ok(null);
    }

    const recordsResult = await deps.ceRecordRepo.findCeRecords(user.id, period.start, period.end);
    if (recordsResult.isErr()) {
      return err(recordsResult.error);
    }

    const aggregate = aggregateRequirement({
      records: recordsResult.value,
      period,
      totalRequired: rule.totalRequired,
      subRequirements: subRequirementSpecs(rule, period, now),
    });

    return ok({
      designation: rule.code,
      total: aggregate.total,
      subRequirements: aggregate.subRequirements,
      period,
      isComplete: aggregate.isComplete,
      details: rule.details?.(userDesignation) ?? {},
    });
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

const buildCalculatorRegistry = (): ReadonlyMap<CalculatedDesignation, DesignationCalculator> =>
  new Map(
    Object.values(DESIGNATION_RULES).map(
      (rule) => [rule.code, makeDesignationCalculator(rule)] as const
    )
  );

export const DESIGNATION_CALCULATORS = buildCalculatorRegistry();

/**
 * Returns undefined for designations that are assignable but not modeled (CLE)
 * and for unknown codes.
 */
export function getDesignationCalculator(code: string): DesignationCalculator | undefined {
  return hasDesignationRule(code) ? DESIGNATION_CALCULATORS.get(code) : undefined;
}
