/**
 * Fake implementations for testing
 * In-memory repositories and a Kysely driver that never touches a database
 */

import {
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type CompiledQuery,
  type DatabaseConnection,
  type Driver,
  type QueryResult,
} from 'kysely';
import { err, ok, type Result } from 'neverthrow';

import type { CeTrackerDatabase, CeTrackerDbClient } from '@/infra/database/client.js';
import type { CeRequirementsError } from '@/modules/ce-requirements/core/errors.js';
import type {
  CeRecordRepository,
  UserProfileRepository,
} from '@/modules/ce-requirements/core/ports.js';
import type {
  CeRecord,
  CeTrackingUser,
  UserDesignation,
} from '@/modules/ce-requirements/core/types.js';

const createDbError = (): Result<never, CeRequirementsError> =>
  err({ type: 'DatabaseError', message: 'Simulated database error', retryable: true });

// =============================================================================
// CE Record Repository Fake
// =============================================================================

interface FakeCeRecordRepoOptions {
  /** Records to seed the store with, for any user */
  records?: CeRecord[];
  /** Enable database error simulation */
  simulateDbError?: boolean;
}

export interface FakeCeRecordRepo extends CeRecordRepository {
  /** Arguments of every findCeRecords call, in order */
  readonly calls: { userId: string; dateFrom: string; dateTo: string }[];
}

/**
 * Creates a fake CE record repository.
 *
 * Filters by user and inclusive date bounds, like the SQL implementation.
 */
export const makeFakeCeRecordRepo = (options: FakeCeRecordRepoOptions = {}): FakeCeRecordRepo => {
  const records = options.records ?? [];
  const simulateDbError = options.simulateDbError ?? false;
  const calls: FakeCeRecordRepo['calls'] = [];

  return {
    calls,
    findCeRecords: async (userId, dateFrom, dateTo) => {
      calls.push({ userId, dateFrom, dateTo });
      if (simulateDbError) return createDbError();

      return ok(
        records.filter(
          (record) =>
            record.userId === userId &&
            record.dateCompleted >= dateFrom &&
            record.dateCompleted <= dateTo
        )
      );
    },
  };
};

// =============================================================================
// User Profile Repository Fake
// =============================================================================

interface FakeUserProfileRepoOptions {
  users?: CeTrackingUser[];
  designations?: UserDesignation[];
  /** Enable database error simulation */
  simulateDbError?: boolean;
}

/**
 * Creates a fake user profile repository backed by arrays.
 */
export const makeFakeUserProfileRepo = (
  options: FakeUserProfileRepoOptions = {}
): UserProfileRepository => {
  const users = options.users ?? [];
  const designations = options.designations ?? [];
  const simulateDbError = options.simulateDbError ?? false;

  return {
    getUser: async (userId) => {
      if (simulateDbError) return createDbError();
      return ok(users.find((user) => user.id === userId) ?? null);
    },
    listDesignations: async (userId) => {
      if (simulateDbError) return createDbError();
      return ok(designations.filter((designation) => designation.userId === userId));
    },
  };
};

// =============================================================================
// Kysely Fake
// =============================================================================

interface FakeCeTrackerDbOptions {
  /** Rows returned by every query */
  rows?: Record<string, unknown>[];
  /** If provided, every query fails with this error */
  failWithError?: Error;
}

export interface FakeCeTrackerDb {
  db: CeTrackerDbClient;
  /** Compiled queries in execution order */
  queries: CompiledQuery[];
}

/**
 * Creates a Kysely client whose driver answers every query from memory.
 *
 * Queries are compiled with the real Postgres compiler, so tests can assert
 * the SQL and parameters the repositories send.
 */
export const makeFakeCeTrackerDb = (options: FakeCeTrackerDbOptions = {}): FakeCeTrackerDb => {
  const { rows = [], failWithError } = options;
  const queries: CompiledQuery[] = [];

  const connection: DatabaseConnection = {
    executeQuery: async <R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> => {
      queries.push(compiledQuery);
      if (failWithError !== undefined) {
        throw failWithError;
      }
      return { rows: rows.map((row) => ({ ...row })) as R[] };
    },
    streamQuery: async function* <R>(): AsyncIterableIterator<QueryResult<R>> {
      throw new Error('Streaming is not supported by the fake driver');
    },
  };

  const driver: Driver = {
    init: async () => undefined,
    acquireConnection: async () => connection,
    beginTransaction: async () => undefined,
    commitTransaction: async () => undefined,
    rollbackTransaction: async () => undefined,
    releaseConnection: async () => undefined,
    destroy: async () => undefined,
  };

  const db = new Kysely<CeTrackerDatabase>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => driver,
      createIntrospector: (kysely) => new PostgresIntrospector(kysely),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });

  return { db, queries };
};
