/**
 * CE Requirements Module - Validation Logic
 *
 * Checks a proposed designation assignment before it is stored, so that
 * anchor fields exist exactly where the period rules need them.
 */

import { ok, err, type Result } from 'neverthrow';

import { BIRTH_MONTH_DESIGNATIONS, STATE_DESIGNATIONS } from './catalog.js';
import {
  createInvalidDesignationAssignmentError,
  type InvalidDesignationAssignmentError,
} from './errors.js';
import {
  isDesignationCode,
  type DesignationAssignmentInput,
  type DesignationCode,
  type ValidatedDesignationAssignment,
} from './types.js';

const INTEGER_PATTERN = /^-?\d+$/;
const STATE_PATTERN = /^[A-Za-z]{2}$/;

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || (typeof value === 'string' && value.trim() === '');

// ─────────────────────────────────────────────────────────────────────────────
// Field Validation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parses and range-checks a birth month (1-12).
 */
export function validateBirthMonth(
  value: number | string | null | undefined,
  designation: DesignationCode
): Result<number, InvalidDesignationAssignmentError> {
  if (value === undefined || value === null || isBlank(value)) {
    return err(
      createInvalidDesignationAssignmentError(
        'birthMonth',
        `Birth month is required for ${designation} designation.`
      )
    );
  }

  let month: number;
  if (typeof value === 'number') {
    month = value;
  } else {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
      return err(createInvalidDesignationAssignmentError('birthMonth', 'Invalid birth month.', value));
    }
    month = Number.parseInt(trimmed, 10);
  }

  if (!Number.isInteger(month)) {
    return err(createInvalidDesignationAssignmentError('birthMonth', 'Invalid birth month.', value));
  }

  if (month < 1 || month > 12) {
    return err(
      createInvalidDesignationAssignmentError(
        'birthMonth',
        'Birth month must be between 1 and 12.',
        value
      )
    );
  }

  return ok(month);
}

/**
 * Requires a 2-letter state code and normalizes it to upper case.
 */
export function validateState(
  value: string | null | undefined,
  designation: DesignationCode
): Result<string, InvalidDesignationAssignmentError> {
  if (value === undefined || value === null || isBlank(value)) {
    return err(
      createInvalidDesignationAssignmentError(
        'state',
        `State is required for ${designation} designation.`
      )
    );
  }

  if (!STATE_PATTERN.test(value)) {
    return err(
      createInvalidDesignationAssignmentError(
        'state',
        'Invalid state abbreviation. Please use a 2-letter state code (e.g., CA, NY, TX).',
        value
      )
    );
  }

  return ok(value.toUpperCase());
}

// ─────────────────────────────────────────────────────────────────────────────
// Assignment Validation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validates a designation assignment against the catalog and the user's
 * existing assignments.
 *
 * Anchor fields that do not apply to the designation are dropped.
 */
export function validateDesignationAssignment(
  input: DesignationAssignmentInput,
  existingDesignations: readonly string[]
): Result<ValidatedDesignationAssignment, InvalidDesignationAssignmentError> {
  const { designation } = input;

  if (!isDesignationCode(designation)) {
    return err(
      createInvalidDesignationAssignmentError('designation', 'Invalid designation.', designation)
    );
  }

  if (existingDesignations.includes(designation)) {
    return err(
      createInvalidDesignationAssignmentError(
        'designation',
        `You already have the ${designation} designation.`,
        designation
      )
    );
  }

  let birthMonth: number | null = null;
  if (BIRTH_MONTH_DESIGNATIONS.includes(designation)) {
    const monthResult = validateBirthMonth(input.birthMonth, designation);
    if (monthResult.isErr()) {
      return err(monthResult.error);
    }
    birthMonth = monthResult.value;
  }

  let state: string | null = null;
  if (STATE_DESIGNATIONS.includes(designation)) {
    const stateResult = validateState(input.state, designation);
    if (stateResult.isErr()) {
      return err(stateResult.error);
    }
    state = stateResult.value;
  }

  return ok({ designation, birthMonth, state });
}
