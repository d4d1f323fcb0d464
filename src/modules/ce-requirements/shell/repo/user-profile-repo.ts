/**
 * User Profile Repository - Kysely Implementation
 *
 * Reads the CE-tracking facets of a user and their designation assignments.
 */

import { ok, err, type Result } from 'neverthrow';

import { toDomainDate } from './row-mappers.js';
import { createDatabaseError, type CeRequirementsError } from '../../core/errors.js';

import type { UserProfileRepository } from '../../core/ports.js';
import type { CeTrackingUser, UserDesignation } from '../../core/types.js';
import type { CeTrackerDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface UserProfileRepoOptions {
  db: CeTrackerDbClient;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyUserProfileRepo implements UserProfileRepository {
  private readonly db: CeTrackerDbClient;
  private readonly log: Logger;

  constructor(options: UserProfileRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'user-profile-repo' });
  }

  async getUser(userId: string): Promise<Result<CeTrackingUser | null, CeRequirementsError>> {
    try {
      const row = await this.db
        .selectFrom('users')
        .select(['id', 'is_napfa_member', 'napfa_join_date'])
        .where('id', '=', userId)
        .executeTakeFirst();

      if (row === undefined) {
        return ok(null);
      }

      return ok({
        id: row.id,
        isNapfaMember: row.is_napfa_member,
        napfaJoinDate: row.napfa_join_date !== null ? toDomainDate(row.napfa_join_date) : null,
      });
    } catch (error) {
      this.log.error({ err: error, userId }, 'Failed to load user');
      return err(createDatabaseError('Failed to load user', error));
    }
  }

  async listDesignations(userId: string): Promise<Result<UserDesignation[], CeRequirementsError>> {
    try {
      const rows = await this.db
        .selectFrom('user_designation')
        .select(['id', 'user_id', 'designation', 'birth_month', 'state', 'created_at'])
        .where('user_id', '=', userId)
        .orderBy('id', 'asc')
        .execute();

      return ok(
        rows.map((row) => ({
          id: row.id,
          userId: row.user_id,
          designation: row.designation,
          birthMonth: row.birth_month,
          state: row.state,
          // TIMESTAMPTZ instant; the period resolver reads its UTC day
          createdAt: row.created_at,
        }))
      );
    } catch (error) {
      this.log.error({ err: error, userId }, 'Failed to load designations');
      return err(createDatabaseError('Failed to load designations', error));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export const makeUserProfileRepo = (options: UserProfileRepoOptions): UserProfileRepository => {
  return new KyselyUserProfileRepo(options);
};
