import type { ColumnType, Generated } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// DATE columns: node-postgres parses them to a Date at local midnight
export type CalendarDate = ColumnType<Date | string, Date | string, Date | string>;

// Users Table
// Only the CE-tracking columns are modeled; credentials live elsewhere.
export interface Users {
  id: Generated<string>; // BIGSERIAL -> string
  username: string;
  email: string;
  is_napfa_member: Generated<boolean>;
  napfa_join_date: CalendarDate | null;
  created_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

// User Designation Table
// birth_month is only set for CFP, state only for CPA.
export interface UserDesignationTable {
  id: Generated<string>;
  user_id: string;
  designation: string;
  birth_month: number | null;
  state: string | null;
  created_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

// CE Record Table
export interface CeRecordTable {
  id: Generated<string>;
  user_id: string;
  title: string;
  provider: string | null;
  hours: number;
  date_completed: CalendarDate;
  category: string | null;
  description: string | null;
  is_napfa_approved: Generated<boolean>;
  is_ethics_course: Generated<boolean>;
  napfa_subject_area: string | null;
  created_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

// Database Schema Interface
// Keys match the lowercase table names in schema.sql.
export interface CeTrackerDatabase {
  users: Users;
  user_designation: UserDesignationTable;
  ce_record: CeRecordTable;
}
