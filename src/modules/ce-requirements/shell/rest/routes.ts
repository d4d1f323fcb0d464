/**
 * CE Requirements REST Routes
 *
 * Read-only endpoints for requirement progress and the designation catalog.
 */

import {
  ErrorResponseSchema,
  GetRequirementsQuerySchema,
  GetRequirementsResponseSchema,
  ListDesignationsResponseSchema,
  UserParamsSchema,
  type GetRequirementsQuery,
  type UserParams,
} from './schemas.js';
import { listDesignationCatalog } from '../../core/catalog.js';
import { fromIsoDate, isIsoDate } from '../../core/dates.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { getRequirementsOverview } from '../../core/usecases/get-requirements-overview.js';

import type { CeRecordRepository, UserProfileRepository } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for CE requirements routes.
 */
export interface MakeCeRequirementsRoutesDeps {
  ceRecordRepo: CeRecordRepository;
  userProfileRepo: UserProfileRepository;
  /** Clock used when the request has no asOf; defaults to the system clock */
  now?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates CE requirements REST routes.
 */
export const makeCeRequirementsRoutes = (
  deps: MakeCeRequirementsRoutesDeps
): FastifyPluginAsync => {
  const { ceRecordRepo, userProfileRepo } = deps;
  const clock = deps.now ?? (() => new Date());

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/users/:userId/requirements - Requirement progress overview
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: UserParams; Querystring: GetRequirementsQuery }>(
      '/api/v1/users/:userId/requirements',
      {
        schema: {
          params: UserParamsSchema,
          querystring: GetRequirementsQuerySchema,
          response: {
            200: GetRequirementsResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { userId } = request.params;
        const { asOf } = request.query;

        if (asOf !== undefined && !isIsoDate(asOf)) {
          return reply.status(400).send({
            ok: false,
            error: 'ValidationError',
            message: `Invalid asOf date '${asOf}'`,
          });
        }

        const now = asOf !== undefined ? fromIsoDate(asOf) : clock();
        const result = await getRequirementsOverview(
          { ceRecordRepo, userProfileRepo },
          { userId, now }
        );

        if (result.isErr()) {
          const status = getHttpStatusForError(result.error);
          if (status >= 500) {
            request.log.error({ err: result.error, userId }, 'Failed to compute requirements');
          }
          return reply.status(status).send({
            ok: false,
            error: result.error.type,
            message: result.error.message,
          });
        }

        return reply.status(200).send({
          ok: true,
          data: result.value,
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/designations - Designation catalog
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/designations',
      {
        schema: {
          response: {
            200: ListDesignationsResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        return reply.status(200).send({
          ok: true,
          data: listDesignationCatalog(),
        });
      }
    );
  };
};
