import pino from 'pino';

/**
 * Structured logging with Pino
 * - JSON lines on stderr; stdout is left to the records the CLI prints
 * - Per-user child loggers for tracing one user through the pipeline
 */

const isDev = process.env.NODE_ENV === 'development';

/**
 * Log levels:
 * - trace: Very detailed debugging
 * - debug: Extraction noise, skipped links
 * - info: Per-user outcomes, run progress
 * - warn: Fetch failures, ambiguous verification
 * - error: Something failed
 * - fatal: Run cannot continue
 */
export const logger = pino(
  {
    level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: 'contact-email-finder',
    },
  },
  pino.destination(2)
);

export type Logger = pino.Logger;

/**
 * Create a child logger bound to one user's pipeline
 */
export function createUserLogger(userId: string): Logger {
  return logger.child({ userId });
}
