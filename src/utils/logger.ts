// Shared pino logger
// Reads LOG_LEVEL/NODE_ENV directly so it is safe to import from env.ts

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Options shared by the standalone logger and the Fastify server.
 * Pretty output outside production, silent under vitest.
 */
export function loggerOptions(): LoggerOptions {
  const nodeEnv = process.env.NODE_ENV ?? 'development';
  const isTest = process.env.VITEST === 'true' || nodeEnv === 'test';

  const options: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    enabled: !isTest,
  };

  if (nodeEnv !== 'production' && !isTest) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: 2,
      },
    };
  }

  return options;
}

export const logger: Logger = pino(loggerOptions());

export function childLogger(component: string): Logger {
  return logger.child({ component });
}
