/**
 * Designation Assignment Validation Tests
 */

import { describe, it, expect } from 'vitest';

import {
  validateBirthMonth,
  validateDesignationAssignment,
  validateState,
} from '@/modules/ce-requirements/core/validation.js';

// ─────────────────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────────────────

describe('validateDesignationAssignment', () => {
  it('rejects codes outside the catalog', () => {
    const result = validateDesignationAssignment({ designation: 'MBA' }, []);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'InvalidDesignationAssignmentError',
      message: 'Invalid designation.',
      field: 'designation',
      value: 'MBA',
    });
  });

  it('rejects a designation the user already has', () => {
    const result = validateDesignationAssignment({ designation: 'CFA' }, ['CPA', 'CFA']);

    expect(result._unsafeUnwrapErr().message).toBe('You already have the CFA designation.');
  });

  it('requires a birth month for CFP', () => {
    const result = validateDesignationAssignment({ designation: 'CFP' }, []);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'InvalidDesignationAssignmentError',
      message: 'Birth month is required for CFP designation.',
      field: 'birthMonth',
    });
  });

  it('accepts a CFP birth month given as a string', () => {
    const result = validateDesignationAssignment({ designation: 'CFP', birthMonth: ' 6 ' }, []);

    expect(result._unsafeUnwrap()).toEqual({ designation: 'CFP', birthMonth: 6, state: null });
  });

  it('requires and normalizes a state for CPA', () => {
    expect(validateDesignationAssignment({ designation: 'CPA' }, [])._unsafeUnwrapErr().message).toBe(
      'State is required for CPA designation.'
    );
    expect(
      validateDesignationAssignment({ designation: 'CPA', state: 'ca' }, [])._unsafeUnwrap()
    ).toEqual({ designation: 'CPA', birthMonth: null, state: 'CA' });
  });

  it('drops anchor fields that do not apply', () => {
    const result = validateDesignationAssignment(
      { designation: 'CFA', birthMonth: 4, state: 'NY' },
      []
    );

    expect(result._unsafeUnwrap()).toEqual({ designation: 'CFA', birthMonth: null, state: null });
  });

  it('accepts CLE without a calculator', () => {
    expect(validateDesignationAssignment({ designation: 'CLE' }, [])._unsafeUnwrap()).toEqual({
      designation: 'CLE',
      birthMonth: null,
      state: null,
    });
  });
});

describe('validateBirthMonth', () => {
  it('accepts 1 through 12', () => {
    expect(validateBirthMonth(1, 'CFP')._unsafeUnwrap()).toBe(1);
    expect(validateBirthMonth('12', 'CFP')._unsafeUnwrap()).toBe(12);
  });

  it('rejects values out of range', () => {
    expect(validateBirthMonth(0, 'CFP')._unsafeUnwrapErr().message).toBe(
      'Birth month must be between 1 and 12.'
    );
    expect(validateBirthMonth('13', 'CFP')._unsafeUnwrapErr().message).toBe(
      'Birth month must be between 1 and 12.'
    );
  });

  it('rejects non-integers', () => {
    expect(validateBirthMonth('June', 'CFP')._unsafeUnwrapErr().message).toBe(
      'Invalid birth month.'
    );
    expect(validateBirthMonth(6.5, 'CFP')._unsafeUnwrapErr().message).toBe('Invalid birth month.');
  });

  it('treats blank strings as missing', () => {
    expect(validateBirthMonth('  ', 'CFP')._unsafeUnwrapErr().message).toBe(
      'Birth month is required for CFP designation.'
    );
  });
});

describe('validateState', () => {
  it('rejects anything but two letters', () => {
    const message =
      'Invalid state abbreviation. Please use a 2-letter state code (e.g., CA, NY, TX).';

    expect(validateState('California', 'CPA')._unsafeUnwrapErr().message).toBe(message);
    expect(validateState('C1', 'CPA')._unsafeUnwrapErr().message).toBe(message);
  });

  it('upper-cases valid codes', () => {
    expect(validateState('tx', 'CPA')._unsafeUnwrap()).toBe('TX');
  });
});
