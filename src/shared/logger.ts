/**
 * Structured JSON logger with API key redaction.
 * Writes to stderr so that CLI stdout carries model output only.
 */

import pino from 'pino';

const logLevel = process.env['LOG_LEVEL'] ?? 'info';

// Pretty output unless LOG_FORMAT=json or running in production
const usePretty =
  process.env['LOG_FORMAT'] === 'pretty' ||
  (process.env['NODE_ENV'] !== 'production' && process.env['LOG_FORMAT'] !== 'json');

export const redactPaths = [
  'req.headers.authorization',
  'req.headers["api-key"]',
  'headers.Authorization',
  '*.apiKey',
  '*.api_key',
];

export const logger = pino(
  {
    name: 'wattstream',
    level: logLevel,
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
    ...(usePretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          colorize: true,
          destination: 2,
        },
      },
    }),
  },
  usePretty ? undefined : pino.destination(2),
);
