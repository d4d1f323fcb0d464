/**
 * CE Requirements REST API Schemas
 *
 * TypeBox schemas for request/response validation.
 */

import { Type, type Static } from '@sinclair/typebox';

import { ALLOWED_DESIGNATIONS } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shared Schemas
// ─────────────────────────────────────────────────────────────────────────────

const IsoDateSchema = Type.String({
  pattern: '^\\d{4}-\\d{2}-\\d{2}$',
  description: 'Calendar date (YYYY-MM-DD)',
});

export const DesignationCodeSchema = Type.Union(
  ALLOWED_DESIGNATIONS.map((code) => Type.Literal(code))
);

export const ReportingPeriodSchema = Type.Object({
  start: IsoDateSchema,
  end: IsoDateSchema,
});

export const RequirementProgressSchema = Type.Object({
  required: Type.Number(),
  earned: Type.Number(),
  remaining: Type.Number(),
  percentage: Type.Number({ minimum: 0, maximum: 100 }),
});

export const SubRequirementResultSchema = Type.Object({
  key: Type.Union([Type.Literal('ethics'), Type.Literal('yearly')]),
  label: Type.String(),
  period: ReportingPeriodSchema,
  required: Type.Number(),
  earned: Type.Number(),
  remaining: Type.Number(),
  percentage: Type.Number(),
});

export const DesignationDetailsSchema = Type.Object({
  state: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  adminFee: Type.Optional(Type.Number()),
  volunteerHoursRequired: Type.Optional(Type.Number()),
});

export const DesignationRequirementResultSchema = Type.Object({
  designation: DesignationCodeSchema,
  total: RequirementProgressSchema,
  subRequirements: Type.Array(SubRequirementResultSchema),
  period: ReportingPeriodSchema,
  isComplete: Type.Boolean(),
  details: DesignationDetailsSchema,
});

export const NapfaRequirementResultSchema = Type.Object({
  total: RequirementProgressSchema,
  napfaApproved: RequirementProgressSchema,
  ethics: Type.Object({
    required: Type.Literal(true),
    completed: Type.Boolean(),
  }),
  cycle: ReportingPeriodSchema,
  tier: Type.Union([
    Type.Literal('full'),
    Type.Literal('second-half-start-year'),
    Type.Literal('first-half-end-year'),
    Type.Literal('second-half-end-year'),
  ]),
  isComplete: Type.Boolean(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Path params for GET /users/:userId/requirements.
 */
export const UserParamsSchema = Type.Object({
  userId: Type.String({ pattern: '^[0-9]+$', description: 'Numeric user id' }),
});

export type UserParams = Static<typeof UserParamsSchema>;

/**
 * Query params for GET /users/:userId/requirements.
 */
export const GetRequirementsQuerySchema = Type.Object(
  {
    asOf: Type.Optional(IsoDateSchema),
  },
  { additionalProperties: false }
);

export type GetRequirementsQuery = Static<typeof GetRequirementsQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Success response for GET /users/:userId/requirements.
 */
export const GetRequirementsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    asOf: IsoDateSchema,
    designations: Type.Array(DesignationRequirementResultSchema),
    napfa: Type.Union([NapfaRequirementResultSchema, Type.Null()]),
  }),
});

/**
 * Success response for GET /designations.
 */
export const ListDesignationsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(
    Type.Object({
      code: DesignationCodeSchema,
      description: Type.String(),
      requiresBirthMonth: Type.Boolean(),
      requiresState: Type.Boolean(),
      hasCalculator: Type.Boolean(),
    })
  ),
});

/**
 * Error response.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
