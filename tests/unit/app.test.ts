/**
 * Unit tests for app factory
 */

import { describe, expect, it } from 'vitest';

import { buildApp, createApp } from '@/app/build-app.js';

import { makeTestConfig } from '../fixtures/builders.js';
import {
  makeFakeCeRecordRepo,
  makeFakeCeTrackerDb,
  makeFakeUserProfileRepo,
} from '../fixtures/fakes.js';

describe('App Factory', () => {
  describe('buildApp', () => {
    it('creates a Fastify instance from injected repositories', async () => {
      const app = await buildApp({
        fastifyOptions: { logger: false },
        deps: {
          config: makeTestConfig(),
          ceRecordRepo: makeFakeCeRecordRepo(),
          userProfileRepo: makeFakeUserProfileRepo(),
        },
      });

      expect(app).toBeDefined();
      expect(app.server).toBeDefined();

      await app.close();
    });

    it('accepts custom logger', async () => {
      const app = await buildApp({
        fastifyOptions: { logger: { level: 'silent' } },
        deps: {
          config: makeTestConfig(),
          ceRecordRepo: makeFakeCeRecordRepo(),
          userProfileRepo: makeFakeUserProfileRepo(),
        },
      });

      expect(app.log.level).toBe('silent');

      await app.close();
    });

    it('throws without a database or repositories', async () => {
      await expect(
        buildApp({
          fastifyOptions: { logger: false },
          deps: { config: makeTestConfig(), ceRecordRepo: makeFakeCeRecordRepo() },
        })
      ).rejects.toThrow('Missing required dependencies');
    });

    it('builds repositories from the database client', async () => {
      const { db, queries } = makeFakeCeTrackerDb();
      const app = await buildApp({
        fastifyOptions: { logger: false },
        deps: { config: makeTestConfig(), db },
      });

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/users/5/requirements?asOf=2025-05-01',
      });

      expect(response.statusCode).toBe(404);
      expect(queries[0]?.parameters).toEqual(['5']);

      await app.close();
    });
  });

  describe('createApp', () => {
    it('returns a ready app instance', async () => {
      const app = await createApp({
        fastifyOptions: { logger: false },
        deps: {
          config: makeTestConfig(),
          ceRecordRepo: makeFakeCeRecordRepo(),
          userProfileRepo: makeFakeUserProfileRepo(),
        },
      });

      const routes = app.printRoutes();
      expect(routes).toContain('designations');
      expect(routes).toContain('requirements');

      await app.close();
    });
  });
});
