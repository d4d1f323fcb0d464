/**
 * CE Requirements Module - NAPFA Calculator
 *
 * NAPFA membership runs on a two-year cycle starting on even years.
 * Members who join part-way through a cycle owe a pro-rated amount.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  aggregateRequirement,
  isEthicsCourse,
  isNapfaApproved,
  recordsWithin,
} from './aggregator.js';
import { calendarDate } from './dates.js';
import { resolveNapfaCycle } from './periods.js';

import type { CeRequirementsError } from './errors.js';
import type { CeRecordRepository } from './ports.js';
import type { CeTrackingUser, IsoDate, NapfaRequirementResult, NapfaTier } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Tiers
// ─────────────────────────────────────────────────────────────────────────────

export interface NapfaTierRequirement {
  tier: NapfaTier;
  totalRequired: number;
  napfaApprovedRequired: number;
}

/**
 * Picks the requirement tier from where the join date falls in the cycle.
 * Join dates before the cycle owe the full amount.
 */
export function resolveNapfaTier(
  joinDate: IsoDate,
  cycleStartYear: number
): NapfaTierRequirement {
  const cycleEndYear = cycleStartYear + 1;

  if (joinDate <= calendarDate(cycleStartYear, 6, 30)) {
    return { tier: 'full', totalRequired: 60, napfaApprovedRequired: 30 };
  }
  if (joinDate <= calendarDate(cycleStartYear, 12, 31)) {
    return { tier: 'second-half-start-year', totalRequired: 45, napfaApprovedRequired: 30 };
  }
  if (joinDate <= calendarDate(cycleEndYear, 6, 30)) {
    return { tier: 'first-half-end-year', totalRequired: 30, napfaApprovedRequired: 30 };
  }
  return { tier: 'second-half-end-year', totalRequired: 15, napfaApprovedRequired: 15 };
}

// ─────────────────────────────────────────────────────────────────────────────
// Calculator
// ─────────────────────────────────────────────────────────────────────────────

export interface NapfaCalculatorDeps {
  ceRecordRepo: CeRecordRepository;
}

export interface NapfaCalculatorInput {
  user: CeTrackingUser;
  now: Date;
}

/**
 * Computes NAPFA progress for the cycle containing `now`.
 * Resolves to null for non-members and members without a join date.
 */
export async function calculateNapfaRequirements(
  deps: NapfaCalculatorDeps,
  input: NapfaCalculatorInput
): Promise<Result<NapfaRequirementResult | null, CeRequirementsError>> {
  const { user, now } = input;

  if (!user.isNapfaMember || user.napfaJoinDate === null) {
    return ok(null);
  }

  const cycle = resolveNapfaCycle(now);
  const period = { start: cycle.start, end: cycle.end };
  const { tier, totalRequired, napfaApprovedRequired } = resolveNapfaTier(
    user.napfaJoinDate,
    cycle.startYear
  );

  const recordsResult = await deps.ceRecordRepo.findCeRecords(user.id, period.start, period.end);
  if (recordsResult.isErr()) {
    return err(recordsResult.error);
  }

  const records = recordsWithin(recordsResult.value, period);
  const aggregate = aggregateRequirement({
    records,
    period,
    totalRequired,
    subRequirements: [],
  });
  const approved = aggregateRequirement({
    records: records.filter(isNapfaApproved),
    period,
    totalRequired: napfaApprovedRequired,
    subRequirements: [],
  });
  const ethicsCompleted = records.some(isEthicsCourse);

  return ok({
    total: aggregate.total,
    napfaApproved: approved.total,
    ethics: { required: true, completed: ethicsCompleted },
    cycle: period,
    tier,
    isComplete: aggregate.isComplete && approved.isComplete && ethicsCompleted,
  });
}
