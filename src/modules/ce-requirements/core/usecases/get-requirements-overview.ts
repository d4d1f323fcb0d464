/**
 * Get Requirements Overview Use Case
 *
 * Loads a user's CE-tracking profile and computes every applicable
 * requirement: one entry per calculated designation plus NAPFA.
 */

import { ok, err, type Result } from 'neverthrow';

import { calculateDesignationRequirements } from './calculate-designation-requirements.js';
import { toIsoDate } from '../dates.js';
import { createUserNotFoundError, type CeRequirementsError } from '../errors.js';
import { calculateNapfaRequirements } from '../napfa.js';

import type { CeRecordRepository, UserProfileRepository } from '../ports.js';
import type { RequirementsOverview } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface GetRequirementsOverviewDeps {
  ceRecordRepo: CeRecordRepository;
  userProfileRepo: UserProfileRepository;
}

export interface GetRequirementsOverviewInput {
  userId: string;
  /** Reference instant; its local calendar date is "today" */
  now: Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds the requirements overview for a user.
 *
 * @returns UserNotFoundError if the user does not exist
 */
export async function getRequirementsOverview(
  deps: GetRequirementsOverviewDeps,
  input: GetRequirementsOverviewInput
): Promise<Result<RequirementsOverview, CeRequirementsError>> {
  const { ceRecordRepo, userProfileRepo } = deps;
  const { userId, now } = input;

  const userResult = await userProfileRepo.getUser(userId);
  if (userResult.isErr()) {
    return err(userResult.error);
  }

  const user = userResult.value;
  if (user === null) {
    return err(createUserNotFoundError(userId));
  }

  const designationsResult = await userProfileRepo.listDesignations(userId);
  if (designationsResult.isErr()) {
    return err(designationsResult.error);
  }

  const requirementsResult = await calculateDesignationRequirements(
    { ceRecordRepo },
    { user, designations: designationsResult.value, now }
  );
  if (requirementsResult.isErr()) {
    return err(requirementsResult.error);
  }

  const napfaResult = await calculateNapfaRequirements({ ceRecordRepo }, { user, now });
  if (napfaResult.isErr()) {
    return err(napfaResult.error);
  }

  return ok({
    asOf: toIsoDate(now),
    designations: requirementsResult.value,
    napfa: napfaResult.value,
  });
}
