/**
 * Row to domain mapping shared by the Kysely repositories.
 */

import { toIsoDate } from '../../core/dates.js';

import type { CeRecord, IsoDate } from '../../core/types.js';
import type { Selectable } from 'kysely';
import type { CeRecordTable } from '@/infra/database/client.js';

/**
 * node-postgres returns DATE columns as a Date at local midnight unless a
 * custom type parser is installed, in which case they arrive as strings.
 */
export function toDomainDate(value: Date | string): IsoDate {
  return typeof value === 'string' ? value.slice(0, 10) : toIsoDate(value);
}

export function mapCeRecordRow(row: Selectable<CeRecordTable>): CeRecord {
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    provider: row.provider,
    hours: row.hours,
    dateCompleted: toDomainDate(row.date_completed),
    category: row.category,
    description: row.description,
    isNapfaApproved: row.is_napfa_approved,
    isEthicsCourse: row.is_ethics_course,
    napfaSubjectArea: row.napfa_subject_area,
  };
}
