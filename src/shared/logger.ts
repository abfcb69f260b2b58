/**
 * Structured JSON logger with credential redaction.
 * Must be imported before any logging occurs so that upstream API keys and
 * caller bearer tokens never reach the log stream.
 */

import pino from 'pino';

const logLevel = process.env['LOG_LEVEL'] ?? 'info';

// Determine if pretty logging should be used:
// - Explicit LOG_FORMAT=pretty → use pretty
// - Explicit LOG_FORMAT=json → use JSON
// - Otherwise in non-production → use pretty (default dev experience)
// - Production → use JSON
const usePretty =
  process.env['LOG_FORMAT'] === 'pretty' ||
  (process.env['NODE_ENV'] !== 'production' && process.env['LOG_FORMAT'] !== 'json');

/** Paths redacted from every log line. Shared with the logger tests. */
export const REDACT_PATHS = [
  'req.headers.authorization',
  'headers.authorization',
  'headers.Authorization',
  '*.headers.authorization',
  '*.headers.Authorization',
  '*.apiKey',
  '*.api_key',
];

export const logger = pino({
  name: 'apiwarden',
  level: logLevel,
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },
  ...(usePretty && {
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        colorize: true,
      },
    },
  }),
});
