/**
 * CE Requirements Module - Designation Rules
 *
 * One declarative description per designation with a calculator:
 * the period rule, the total hours, and any nested minimums.
 * Built once at module load and never mutated.
 */

import { anyRecord, mentionsEthics, type RecordPredicate } from './aggregator.js';

import type { PeriodRule } from './periods.js';
import type {
  CalculatedDesignation,
  DesignationDetails,
  SubRequirementKey,
  UserDesignation,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Window a sub-requirement is evaluated over.
 * - `period`: the designation's own reporting period
 * - `current-year`: the calendar year containing "now" (yearly minimums)
 */
export type SubRequirementWindow = 'period' | 'current-year';

export interface SubRequirementRule {
  key: SubRequirementKey;
  label: string;
  required: number;
  matches: RecordPredicate;
  window: SubRequirementWindow;
}

export interface DesignationRule {
  code: CalculatedDesignation;
  period: PeriodRule;
  totalRequired: number;
  subRequirements: readonly SubRequirementRule[];
  details?: (userDesignation: UserDesignation) => DesignationDetails;
}

// ─────────────────────────────────────────────────────────────────────────────
// Shared Pieces
// ─────────────────────────────────────────────────────────────────────────────

const CALENDAR_YEAR: PeriodRule = { kind: 'calendar-year' };
const ODD_YEAR_BIENNIAL: PeriodRule = { kind: 'odd-year-biennial' };
const ANNIVERSARY_BIENNIAL: PeriodRule = { kind: 'anniversary-biennial' };

const ethics = (required: number): SubRequirementRule => ({
  key: 'ethics',
  label: 'Ethics',
  required,
  matches: mentionsEthics,
  window: 'period',
});

/** CEPI renewal: $250 admin fee, waived after 15 volunteer hours */
const cepiDetails = (): DesignationDetails => ({
  adminFee: 250,
  volunteerHoursRequired: 15,
});

const simple = (
  code: CalculatedDesignation,
  period: PeriodRule,
  totalRequired: number
): DesignationRule => ({ code, period, totalRequired, subRequirements: [] });

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export const DESIGNATION_RULES: Readonly<Record<CalculatedDesignation, DesignationRule>> =
  Object.freeze({
    CFP: {
      code: 'CFP',
      period: { kind: 'birth-month-biennial' },
      totalRequired: 30,
      subRequirements: [ethics(2)],
    },
    CPA: {
      code: 'CPA',
      period: CALENDAR_YEAR,
      totalRequired: 40,
      subRequirements: [],
      details: (userDesignation) => ({ state: userDesignation.state }),
    },
    EA: {
      code: 'EA',
      period: { kind: 'fixed-multiyear', years: 3 },
      totalRequired: 72,
      subRequirements: [
        {
          key: 'yearly',
          label: 'Yearly minimum',
          required: 16,
          matches: anyRecord,
          window: 'current-year',
        },
        ethics(2),
      ],
    },
    CEP: { ...simple('CEP', ANNIVERSARY_BIENNIAL, 30), details: cepiDetails },
    ECA: { ...simple('ECA', ANNIVERSARY_BIENNIAL, 30), details: cepiDetails },
    CFA: simple('CFA', CALENDAR_YEAR, 20),
    CLU: simple('CLU', ODD_YEAR_BIENNIAL, 30),
    ChFC: simple('ChFC', ODD_YEAR_BIENNIAL, 30),
    CIMA: simple('CIMA', ODD_YEAR_BIENNIAL, 40),
    CIMC: simple('CIMC', ODD_YEAR_BIENNIAL, 40),
    CPWA: simple('CPWA', ODD_YEAR_BIENNIAL, 40),
    CRPS: simple('CRPS', ODD_YEAR_BIENNIAL, 16),
    RICP: simple('RICP', ODD_YEAR_BIENNIAL, 30),
    CDFA: simple('CDFA', CALENDAR_YEAR, 15),
    AIF: simple('AIF', CALENDAR_YEAR, 6),
    IAR: {
      code: 'IAR',
      period: CALENDAR_YEAR,
      totalRequired: 12,
      subRequirements: [ethics(6)],
    },
  });

export const hasDesignationRule = (code: string): code is CalculatedDesignation =>
  Object.prototype.hasOwnProperty.call(DESIGNATION_RULES, code);

/**
 * Looks up the rule for a stored designation code.
 * Codes without a calculator (CLE, unknown codes) yield undefined.
 */
export function getDesignationRule(code: string): DesignationRule | undefined {
  return hasDesignationRule(code) ? DESIGNATION_RULES[code] : undefined;
}
