/**
 * Unit tests for database client initialization
 */

import { describe, expect, it } from 'vitest';

import { initDatabase } from '@/infra/database/client.js';

import { makeTestConfig } from '../../fixtures/builders.js';

describe('initDatabase', () => {
  it('throws when DATABASE_URL is missing', () => {
    const config = makeTestConfig({ database: { url: undefined } });

    expect(() => initDatabase(config)).toThrow(
      'Missing configuration for CE Tracker Database (DATABASE_URL)'
    );
  });

  it('creates a client without connecting', async () => {
    const db = initDatabase(makeTestConfig());

    expect(db).toBeDefined();
    await db.destroy();
  });
});
