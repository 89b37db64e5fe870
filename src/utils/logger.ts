import pino from 'pino';
import { config } from '../config.js';

export interface LoggerConfig {
  level: string;
  transport?: { target: string; options: Record<string, unknown> };
}

/** Shared by the standalone logger and the Fastify server. Silent under test. */
export const loggerOptions: LoggerConfig = {
  level: config.NODE_ENV === 'test' ? 'silent' : config.LOG_LEVEL,
  ...(config.NODE_ENV === 'development'
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }
    : {}),
};

export const logger = pino(loggerOptions);
