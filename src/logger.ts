// Shared pino logger
// Fastify is started with the same options so request logs and service logs look alike

import { pino, type Logger, type LoggerOptions } from 'pino';
import { env } from './env.js';

function buildLoggerOptions(): LoggerOptions {
  if (env.NODE_ENV === 'test') {
    return { level: 'silent' };
  }

  if (env.NODE_ENV === 'development') {
    return {
      level: env.LOG_LEVEL,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    };
  }

  return { level: env.LOG_LEVEL };
}

export const loggerOptions = buildLoggerOptions();

export const logger: Logger = pino(loggerOptions);

export type { Logger };
