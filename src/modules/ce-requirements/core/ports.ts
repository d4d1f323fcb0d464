/**
 * CE Requirements Module - Ports (Interfaces)
 *
 * Read contracts the calculators depend on.
 */

import type { CeRequirementsError } from './errors.js';
import type { CeRecord, CeTrackingUser, IsoDate, UserDesignation } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Read access to a user's CE records.
 */
export interface CeRecordRepository {
  /**
   * All CE records completed by the user within [dateFrom, dateTo], both inclusive.
   * No ordering is guaranteed and results are never truncated.
   */
  findCeRecords(
    userId: string,
    dateFrom: IsoDate,
    dateTo: IsoDate
  ): Promise<Result<CeRecord[], CeRequirementsError>>;
}

/**
 * Read access to a user's CE-tracking profile.
 */
export interface UserProfileRepository {
  /**
   * Returns null if the user does not exist.
   */
  getUser(userId: string): Promise<Result<CeTrackingUser | null, CeRequirementsError>>;

  /**
   * Designation assignments for the user, oldest first.
   */
  listDesignations(userId: string): Promise<Result<UserDesignation[], CeRequirementsError>>;
}
