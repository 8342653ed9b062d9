/**
 * @strata/telemetry - Structured logging
 *
 * One pino logger shared by every Strata package. Middleware logs at
 * `trace` and `debug`; request payloads are never logged.
 */

import { pino, stdSerializers, type Logger, type LoggerOptions } from 'pino';

const REDACT_PATHS = [
  '*.authorization',
  '*.password',
  '*.secret',
  '*.apiKey',
  '*.token',
];

export type { Logger };

/**
 * Build a logger with Strata's defaults. `options` override them.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'strata',
    level: process.env.STRATA_LOG_LEVEL || 'info',

    formatters: {
      level: (label) => ({ level: label }),
    },

    serializers: {
      err: stdSerializers.err,
    },

    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },

    ...options,
  });
}

export const logger = createLogger();
