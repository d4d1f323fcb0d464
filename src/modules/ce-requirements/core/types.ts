/**
 * CE Requirements Module - Domain Types
 *
 * Types for designation and NAPFA continuing-education progress.
 * Calendar dates are carried as ISO strings (YYYY-MM-DD).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Designations
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Designations a user may assign to themselves, in display order.
 */
export const ALLOWED_DESIGNATIONS = [
  'CFP',
  'CFA',
  'CPA',
  'CLE',
  'CLU',
  'EA',
  'ChFC',
  'CIMA',
  'CIMC',
  'CPWA',
  'CRPS',
  'RICP',
  'CDFA',
  'AIF',
  'IAR',
  'CEP',
  'ECA',
] as const;

export type DesignationCode = (typeof ALLOWED_DESIGNATIONS)[number];

/**
 * Designations that have a requirement calculator.
 * CLE is assignable but its rules vary by jurisdiction and are not modeled.
 */
export type CalculatedDesignation = Exclude<DesignationCode, 'CLE'>;

export const isDesignationCode = (value: string): value is DesignationCode =>
  ALLOWED_DESIGNATIONS.some((code) => code === value);

// ─────────────────────────────────────────────────────────────────────────────
// Entities
// ─────────────────────────────────────────────────────────────────────────────

/** Calendar date in ISO format (YYYY-MM-DD) */
export type IsoDate = string;

/**
 * CE-tracking facets of a user.
 */
export interface CeTrackingUser {
  id: string;
  isNapfaMember: boolean;
  napfaJoinDate: IsoDate | null;
}

/**
 * A designation assigned to a user.
 * `birthMonth` is only set for CFP and `state` only for CPA.
 */
export interface UserDesignation {
  id: string;
  userId: string;
  /** Raw code as stored; may name a designation without a calculator */
  designation: string;
  /** 1-12 */
  birthMonth: number | null;
  /** 2-letter state code */
  state: string | null;
  /** Anchor for anniversary-based cycles (CEP, ECA) */
  createdAt: Date | null;
}

/**
 * A single completed CE activity.
 */
export interface CeRecord {
  id: string;
  userId: string;
  title: string;
  provider: string | null;
  hours: number;
  dateCompleted: IsoDate;
  category: string | null;
  description: string | null;
  isNapfaApproved: boolean;
  isEthicsCourse: boolean;
  napfaSubjectArea: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Computed Results
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Inclusive reporting window.
 */
export interface ReportingPeriod {
  start: IsoDate;
  end: IsoDate;
}

export interface RequirementProgress {
  required: number;
  earned: number;
  remaining: number;
  /** Always within [0, 100] */
  percentage: number;
}

export type SubRequirementKey = 'ethics' | 'yearly';

export interface SubRequirementResult extends RequirementProgress {
  key: SubRequirementKey;
  label: string;
  /** Window the sub-requirement was evaluated over */
  period: ReportingPeriod;
}

/**
 * Informational extras shown next to a designation's progress.
 */
export interface DesignationDetails {
  state?: string | null;
  adminFee?: number;
  volunteerHoursRequired?: number;
}

export interface DesignationRequirementResult {
  designation: CalculatedDesignation;
  total: RequirementProgress;
  subRequirements: SubRequirementResult[];
  period: ReportingPeriod;
  isComplete: boolean;
  details: DesignationDetails;
}

/**
 * Pro-rated NAPFA requirement tier, by join date within the current cycle.
 */
export type NapfaTier =
  | 'full'
  | 'second-half-start-year'
  | 'first-half-end-year'
  | 'second-half-end-year';

export interface NapfaRequirementResult {
  total: RequirementProgress;
  napfaApproved: RequirementProgress;
  ethics: {
    required: true;
    completed: boolean;
  };
  cycle: ReportingPeriod;
  tier: NapfaTier;
  isComplete: boolean;
}

/**
 * Everything the dashboard needs for one user.
 */
export interface RequirementsOverview {
  asOf: IsoDate;
  designations: DesignationRequirementResult[];
  napfa: NapfaRequirementResult | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────────

export interface DesignationCatalogEntry {
  code: DesignationCode;
  description: string;
  requiresBirthMonth: boolean;
  requiresState: boolean;
  hasCalculator: boolean;
}

/**
 * Proposed designation assignment, as submitted by a user.
 */
export interface DesignationAssignmentInput {
  designation: string;
  birthMonth?: number | string | null | undefined;
  state?: string | null | undefined;
}

export interface ValidatedDesignationAssignment {
  designation: DesignationCode;
  birthMonth: number | null;
  state: string | null;
}
