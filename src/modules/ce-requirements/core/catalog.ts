/**
 * CE Requirements Module - Designation Catalog
 *
 * Human-readable requirement summaries for every assignable designation.
 */

import { hasDesignationRule } from './designation-rules.js';
import { ALLOWED_DESIGNATIONS, type DesignationCatalogEntry, type DesignationCode } from './types.js';

export const DESIGNATION_DESCRIPTIONS: Readonly<Record<DesignationCode, string>> = {
  CFP: "CFP® professionals must complete 30 hours of continuing education (CE) every two years, which includes 2 hours of CFP Board-approved Ethics CE and 28 hours in one or more of the CFP Board's Principal Topics.",
  CFA: 'CFA charterholders must complete 20 professional learning (PL) credits per calendar year through the CFA Institute.',
  CPA: 'CPAs must complete continuing professional education (CPE) requirements that vary by state. Most states require 40 hours of CPE per year.',
  CLE: 'Continuing Legal Education (CLE) requirements vary by state and jurisdiction. Most states require attorneys to complete a certain number of CLE hours annually or biennially.',
  CLU: 'CLU professionals must complete 30 hours of continuing education every 2 years as specified by The American College.',
  EA: 'Enrolled Agents (EAs) must complete 72 hours of continuing education (CE) every three years, with a minimum of 16 hours per year. At least 2 hours must be on ethics.',
  ChFC: 'ChFC® professionals must complete 30 hours of continuing education every 2 years as specified by The American College.',
  CIMA: 'CIMA® professionals must complete 40 hours of continuing education every 2 years as specified by the Investments & Wealth Institute.',
  CIMC: 'CIMC® professionals must complete 40 hours of continuing education every 2 years as specified by the Investments & Wealth Institute.',
  CPWA: 'CPWA® professionals must complete 40 hours of continuing education every 2 years as specified by the Investments & Wealth Institute.',
  CRPS: 'CRPS® professionals must complete 16 hours of continuing education every 2 years as specified by The College for Financial Planning.',
  RICP: 'RICP® professionals must complete 30 hours of continuing education every 2 years as specified by The American College.',
  CDFA: 'CDFA® professionals must complete 15 hours of continuing education per year as specified by the Institute for Divorce Financial Analysts.',
  AIF: 'AIF® professionals must complete 6 hours of continuing education per year as specified by Fi360.',
  IAR: 'Investment Adviser Representatives (IARs) must complete 12 hours of continuing education per year, including 6 hours of ethics/products knowledge.',
  CEP: 'Certified Equity Professional (CEP) requires 30 hours of continuing education every two years. $250 administrative fee (waived after 15 hours of volunteer work).',
  ECA: 'Equity Compensation Associate (ECA) requires 30 hours of continuing education every two years. $250 administrative fee (waived after 15 hours of volunteer work).',
};

/** Designations whose period is anchored to the holder's birth month */
export const BIRTH_MONTH_DESIGNATIONS: readonly DesignationCode[] = ['CFP'];

/** Designations whose requirements depend on the licensing state */
export const STATE_DESIGNATIONS: readonly DesignationCode[] = ['CPA'];

export function listDesignationCatalog(): DesignationCatalogEntry[] {
  return ALLOWED_DESIGNATIONS.map((code) => ({
    code,
    description: DESIGNATION_DESCRIPTIONS[code],
    requiresBirthMonth: BIRTH_MONTH_DESIGNATIONS.includes(code),
    requiresState: STATE_DESIGNATIONS.includes(code),
    hasCalculator: hasDesignationRule(code),
  }));
}
