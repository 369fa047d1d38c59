/**
 * Logging with Pino - connection strings and credentials are redacted
 */

import pino from 'pino';

const redactPaths = [
  'password',
  'secret',
  'token',
  'dbPath',
  'connectionString',
  '*.password',
  '*.connectionString',
];

const prettyOutput =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport: prettyOutput
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
