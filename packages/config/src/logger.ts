import pino, { type Logger } from 'pino';

/**
 * The slice of a pino logger the configuration layer writes to.
 * Callers pass their own; the package logger is only the fallback.
 */
export type ConfigLogger = Pick<Logger, 'debug' | 'warn'>;

export const logger = pino({
  name: 'strata-config',
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: ['*.secret', 'secret.secret'],
    censor: '[REDACTED]',
  },
});
