/**
 * CE Requirements Module - Domain Errors
 *
 * Missing anchor data or a misrouted designation is not an error here:
 * calculators return null for those. Errors cover storage failures and
 * user-facing validation.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Database operation failed.
 */
export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * Requested user does not exist.
 */
export interface UserNotFoundError {
  readonly type: 'UserNotFoundError';
  readonly message: string;
  readonly userId: string;
}

/**
 * Designation assignment rejected by validation.
 */
export interface InvalidDesignationAssignmentError {
  readonly type: 'InvalidDesignationAssignmentError';
  readonly message: string;
  readonly field: 'designation' | 'birthMonth' | 'state';
  readonly value?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type CeRequirementsError =
  | DatabaseError
  | UserNotFoundError
  | InvalidDesignationAssignmentError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});

export const createUserNotFoundError = (userId: string): UserNotFoundError => ({
  type: 'UserNotFoundError',
  message: `User with id '${userId}' not found`,
  userId,
});

export const createInvalidDesignationAssignmentError = (
  field: InvalidDesignationAssignmentError['field'],
  message: string,
  value?: unknown
): InvalidDesignationAssignmentError => ({
  type: 'InvalidDesignationAssignmentError',
  message,
  field,
  ...(value !== undefined && { value }),
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const CE_REQUIREMENTS_ERROR_HTTP_STATUS: Record<CeRequirementsError['type'], number> = {
  DatabaseError: 500,
  UserNotFoundError: 404,
  InvalidDesignationAssignmentError: 400,
};

export const getHttpStatusForError = (error: CeRequirementsError): number => {
  return CE_REQUIREMENTS_ERROR_HTTP_STATUS[error.type];
};
