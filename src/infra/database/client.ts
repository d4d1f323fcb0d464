import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { CeTrackerDatabase } from './ce-tracker/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type CeTrackerDbClient = Kysely<CeTrackerDatabase>;

/**
 * Create a Kysely instance for a database URL
 */
const createClient = <T>(connectionString: string): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

/**
 * Initialize the CE tracker database client
 */
export const initDatabase = (config: AppConfig): CeTrackerDbClient => {
  const { url } = config.database;

  if (url === undefined || url === '') {
    throw new Error('Missing configuration for CE Tracker Database (DATABASE_URL)');
  }

  return createClient<CeTrackerDatabase>(url);
};

export type {
  CeTrackerDatabase,
  Users,
  UserDesignationTable,
  CeRecordTable,
} from './ce-tracker/types.js';
