/**
 * CE Record Repository - Kysely Implementation
 *
 * Implements the CeRecordRepository read port over the ce_record table.
 */

import { ok, err, type Result } from 'neverthrow';

import { mapCeRecordRow } from './row-mappers.js';
import { createDatabaseError, type CeRequirementsError } from '../../core/errors.js';

import type { CeRecordRepository } from '../../core/ports.js';
import type { CeRecord, IsoDate } from '../../core/types.js';
import type { CeTrackerDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CeRecordRepoOptions {
  db: CeTrackerDbClient;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyCeRecordRepo implements CeRecordRepository {
  private readonly db: CeTrackerDbClient;
  private readonly log: Logger;

  constructor(options: CeRecordRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'ce-record-repo' });
  }

  async findCeRecords(
    userId: string,
    dateFrom: IsoDate,
    dateTo: IsoDate
  ): Promise<Result<CeRecord[], CeRequirementsError>> {
    try {
      const rows = await this.db
        .selectFrom('ce_record')
        .selectAll()
        .where('user_id', '=', userId)
        .where('date_completed', '>=', dateFrom)
        .where('date_completed', '<=', dateTo)
        .execute();

      return ok(rows.map(mapCeRecordRow));
    } catch (error) {
      this.log.error({ err: error, userId, dateFrom, dateTo }, 'Failed to load CE records');
      return err(createDatabaseError('Failed to load CE records', error));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export const makeCeRecordRepo = (options: CeRecordRepoOptions): CeRecordRepository => {
  return new KyselyCeRecordRepo(options);
};
