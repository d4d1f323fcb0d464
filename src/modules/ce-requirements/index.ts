/**
 * CE Requirements Module - Public API
 *
 * Continuing-education requirement calculation for professional
 * designations and NAPFA membership.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  DesignationCode,
  CalculatedDesignation,
  IsoDate,
  CeTrackingUser,
  UserDesignation,
  CeRecord,
  ReportingPeriod,
  RequirementProgress,
  SubRequirementKey,
  SubRequirementResult,
  DesignationDetails,
  DesignationRequirementResult,
  NapfaTier,
  NapfaRequirementResult,
  RequirementsOverview,
  DesignationCatalogEntry,
  DesignationAssignmentInput,
  ValidatedDesignationAssignment,
} from './core/types.js';

export { ALLOWED_DESIGNATIONS, isDesignationCode } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  CeRequirementsError,
  DatabaseError,
  UserNotFoundError,
  InvalidDesignationAssignmentError,
} from './core/errors.js';

export {
  createDatabaseError,
  createUserNotFoundError,
  createInvalidDesignationAssignmentError,
  getHttpStatusForError,
  CE_REQUIREMENTS_ERROR_HTTP_STATUS,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { CeRecordRepository, UserProfileRepository } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic (Pure Functions)
// ─────────────────────────────────────────────────────────────────────────────

export {
  resolvePeriod,
  resolveCalendarYear,
  resolveNapfaCycle,
  type PeriodRule,
  type PeriodRuleKind,
  type PeriodAnchors,
} from './core/periods.js';

export {
  aggregateRequirement,
  computeProgress,
  sumHours,
  mentionsEthics,
  type RecordPredicate,
  type ResolvedSubRequirement,
} from './core/aggregator.js';

export {
  DESIGNATION_RULES,
  getDesignationRule,
  hasDesignationRule,
  type DesignationRule,
  type SubRequirementRule,
} from './core/designation-rules.js';

export {
  DESIGNATION_CALCULATORS,
  getDesignationCalculator,
  makeDesignationCalculator,
  type DesignationCalculator,
  type DesignationCalculatorDeps,
  type DesignationCalculatorInput,
} from './core/calculators.js';

export {
  calculateNapfaRequirements,
  resolveNapfaTier,
  type NapfaTierRequirement,
} from './core/napfa.js';

export { listDesignationCatalog, DESIGNATION_DESCRIPTIONS } from './core/catalog.js';

export {
  validateDesignationAssignment,
  validateBirthMonth,
  validateState,
} from './core/validation.js';

export { toIsoDate, fromIsoDate, isIsoDate } from './core/dates.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  calculateDesignationRequirements,
  type CalculateDesignationRequirementsDeps,
  type CalculateDesignationRequirementsInput,
} from './core/usecases/calculate-designation-requirements.js';

export {
  getRequirementsOverview,
  type GetRequirementsOverviewDeps,
  type GetRequirementsOverviewInput,
} from './core/usecases/get-requirements-overview.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repositories
// ─────────────────────────────────────────────────────────────────────────────

export { makeCeRecordRepo, type CeRecordRepoOptions } from './shell/repo/ce-record-repo.js';

export {
  makeUserProfileRepo,
  type UserProfileRepoOptions,
} from './shell/repo/user-profile-repo.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST Routes
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeCeRequirementsRoutes,
  type MakeCeRequirementsRoutesDeps,
} from './shell/rest/routes.js';
