/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { createLogger } from '../infra/logger/index.js';
import {
  makeCeRecordRepo,
  makeCeRequirementsRoutes,
  makeUserProfileRepo,
  type CeRecordRepository,
  type UserProfileRepository,
} from '../modules/ce-requirements/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { CeTrackerDbClient } from '../infra/database/client.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** Used to build the repositories that are not injected */
  db?: CeTrackerDbClient;
  ceRecordRepo?: CeRecordRepository;
  userProfileRepo?: UserProfileRepository;
  /** Logger handed to repositories; defaults to one built from config */
  logger?: Logger;
  /** Clock for requests without an explicit asOf */
  now?: () => Date;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
}

const resolveRepos = (
  deps: AppDeps
): { ceRecordRepo: CeRecordRepository; userProfileRepo: UserProfileRepository } => {
  if (deps.ceRecordRepo !== undefined && deps.userProfileRepo !== undefined) {
    return { ceRecordRepo: deps.ceRecordRepo, userProfileRepo: deps.userProfileRepo };
  }

  if (deps.db === undefined) {
    throw new Error('Missing required dependencies: db or ceRecordRepo and userProfileRepo');
  }

  const logger = deps.logger ?? createLogger(deps.config.logger);
  return {
    ceRecordRepo: deps.ceRecordRepo ?? makeCeRecordRepo({ db: deps.db, logger }),
    userProfileRepo: deps.userProfileRepo ?? makeUserProfileRepo({ db: deps.db, logger }),
  };
};

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps } = options;
  const { ceRecordRepo, userProfileRepo } = resolveRepos(deps);

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await app.register(
    makeCeRequirementsRoutes({
      ceRecordRepo,
      userProfileRepo,
      ...(deps.now !== undefined && { now: deps.now }),
    })
  );

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Request error');

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
