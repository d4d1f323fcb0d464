/**
 * Unit tests for logger factory
 */

import { describe, expect, it } from 'vitest';

import { buildLoggerOptions, createLogger } from '@/infra/logger/index.js';

describe('Logger', () => {
  describe('buildLoggerOptions', () => {
    it('uses the service name and requested level', () => {
      expect(buildLoggerOptions({ level: 'debug', pretty: false })).toEqual({
        name: 'ce-tracker-server',
        level: 'debug',
      });
    });

    it('adds the pino-pretty transport when pretty', () => {
      const options = buildLoggerOptions({ level: 'info', pretty: true });

      expect(options.transport).toEqual({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      });
    });
  });

  describe('createLogger', () => {
    it('creates a logger at the configured level', () => {
      const logger = createLogger({ level: 'silent', pretty: false });

      expect(logger.level).toBe('silent');
    });
  });
});
