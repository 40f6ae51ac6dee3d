import pino from 'pino';

export const logger = pino({
  name: 'strata-http',
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: ['secret', '*.secret', 'secret.secret', 'config.secret.secret'],
    censor: '[REDACTED]',
  },
});
