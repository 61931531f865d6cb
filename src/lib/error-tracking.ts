/**
 * Error Tracking Module
 *
 * Failures that are caught and not rethrown (an input row that does not
 * validate, a user whose processing threw) are reported here. Each report
 * gets a short id so a log line can be matched to the user it came from,
 * and each tracker keeps a tally by error name for the end-of-run summary.
 */

import { randomUUID } from 'crypto';
import { logger as rootLogger, type Logger } from './logger';

export interface ErrorContext {
  userId?: string;
  /** Pipeline stage the failure happened in */
  stage?: string;
  component?: string;
  extra?: Record<string, unknown>;
}

export type MessageLevel = 'info' | 'warning' | 'error';

function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(typeof error === 'string' ? error : JSON.stringify(error) ?? String(error));
}

export class ErrorTracker {
  private readonly counts = new Map<string, number>();

  constructor(private readonly log: Logger = rootLogger) {}

  /**
   * Report a caught failure. Returns the id written to the log.
   */
  capture(error: unknown, context: ErrorContext = {}): string {
    const err = toError(error);
    const errorId = randomUUID().slice(0, 8);
    this.counts.set(err.name, (this.counts.get(err.name) ?? 0) + 1);

    this.log.error(
      { errorId, error: err.message, name: err.name, stack: err.stack, ...context },
      `Error captured: ${err.message}`
    );
    return errorId;
  }

  note(message: string, level: MessageLevel = 'info', context: ErrorContext = {}): void {
    if (level === 'error') {
      this.log.error(context, message);
    } else if (level === 'warning') {
      this.log.warn(context, message);
    } else {
      this.log.info(context, message);
    }
  }

  /** Captured failures by error name */
  summary(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}

const defaultTracker = new ErrorTracker();

export function captureError(error: unknown, context?: ErrorContext): string {
  return defaultTracker.capture(error, context);
}

export function captureMessage(message: string, level: MessageLevel = 'info', context?: ErrorContext): void {
  defaultTracker.note(message, level, context);
}
