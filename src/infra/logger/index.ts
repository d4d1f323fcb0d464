/**
 * Logger factory using Pino
 * The same options feed the standalone logger and Fastify's request logger.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'ce-tracker-server',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Builds pino options, with pino-pretty in development for readable logs
 */
export const buildLoggerOptions = (config: Partial<LoggerConfig> = {}): LoggerOptions => {
  const finalConfig = { ...defaultConfig, ...config };

  return {
    name: finalConfig.name,
    level: finalConfig.level,
    ...(finalConfig.pretty === true && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  };
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  return pinoLib(buildLoggerOptions(config));
};

export { type Logger } from 'pino';
