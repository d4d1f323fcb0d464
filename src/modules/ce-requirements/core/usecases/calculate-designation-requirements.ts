/**
 * Calculate Designation Requirements Use Case
 *
 * Runs the matching calculator for each of a user's designation assignments.
 */

import { ok, err, type Result } from 'neverthrow';

import { getDesignationCalculator, type DesignationCalculatorDeps } from '../calculators.js';

import type { CeRequirementsError } from '../errors.js';
import type { CeTrackingUser, DesignationRequirementResult, UserDesignation } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type CalculateDesignationRequirementsDeps = DesignationCalculatorDeps;

export interface CalculateDesignationRequirementsInput {
  user: CeTrackingUser;
  designations: readonly UserDesignation[];
  now: Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Collects requirement results in the order the assignments were given.
 *
 * - Designations without a calculator (e.g. CLE) are skipped
 * - Calculators that resolve to null (missing anchor data) are skipped
 * - The first storage error aborts the whole calculation
 */
export async function calculateDesignationRequirements(
  deps: CalculateDesignationRequirementsDeps,
  input: CalculateDesignationRequirementsInput
): Promise<Result<DesignationRequirementResult[], CeRequirementsError>> {
  const { user, designations, now } = input;
  const results: DesignationRequirementResult[] = [];

  for (const userDesignation of designations) {
    const calculator = getDesignationCalculator(userDesignation.designation);
    if (calculator === undefined) {
      continue;
    }

    const result = await calculator(deps, { user, userDesignation, now });
    if (result.isErr()) {
      return err(result.error);
    }

    if (result.value !== null) {
      results.push(result.value);
    }
  }

  return ok(results);
}
