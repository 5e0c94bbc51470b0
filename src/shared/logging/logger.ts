import pino, { type Logger } from 'pino';
import { config } from '../config/env';

/** Credential fields of the LLM client options and of the parsed config, at the top level or one object down. */
export const REDACT_PATHS = ['apiKey', '*.apiKey', 'LLM_API_KEY', '*.LLM_API_KEY', 'REDIS_URL', '*.REDIS_URL'] as const;

export const logger = pino({
  level: config.LOG_LEVEL,
  base: {
    env: config.NODE_ENV,
    service: 'study-router',
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
  redact: {
    paths: [...REDACT_PATHS],
    remove: true,
  },
  transport:
    config.NODE_ENV === 'test'
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        },
});

export type { Logger };

export const childLogger = (bindings: Record<string, unknown>): Logger => logger.child(bindings);
