/**
 * Error classes shared across the pipeline.
 *
 * Only ResourceExhaustedError is allowed to escape a user's pipeline;
 * everything else is converted into a fetch failure or a verdict.
 */

export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * No outbound connection slot could be obtained. Aborts the whole run.
 */
export class ResourceExhaustedError extends Error {
  constructor(message: string, public readonly waitedMs: number) {
    super(message);
    this.name = 'ResourceExhaustedError';
  }
}

export class ValidationError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Stable string form of anything thrown, for logs and failure reasons
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node system error code (ENOTFOUND, ECONNREFUSED, ...) if present
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
