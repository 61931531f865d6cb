import { logger } from './logger';
import { TimeoutError } from './errors';

/**
 * Request timeout utilities
 * Keeps one slow remote host from stalling a worker
 */

/**
 * Wrap a promise with a timeout
 *
 * @example
 * const records = await withTimeout(
 *   resolver.resolveMx('example.org'),
 *   5000,
 *   'MX lookup timed out'
 * );
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  message = 'Operation timed out'
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      logger.warn({ timeoutMs }, message);
      reject(new TimeoutError(message, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Fetch with timeout support. The timeout also covers reading the body,
 * so the caller passes a reader instead of getting the raw Response back.
 *
 * @example
 * const html = await fetchWithTimeout('https://jane.example.org', {
 *   timeout: 5000,
 *   read: (response) => response.text(),
 * });
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: RequestInit & {
    timeout?: number;
    fetchImpl?: FetchLike;
    read: (response: Response) => Promise<T>;
  }
): Promise<T> {
  const { timeout = TIMEOUTS.FETCH_DEFAULT, fetchImpl = fetch, read, ...fetchOptions } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetchImpl(url, {
      ...fetchOptions,
      signal: controller.signal,
    });
    return await read(response);
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      logger.warn({ url, timeout }, 'Fetch request timed out');
      throw new TimeoutError(`Fetch to ${url} timed out after ${timeout}ms`, timeout);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Common timeout values (in milliseconds)
 */
export const TIMEOUTS = {
  /** Page fetch during crawling (10 seconds) */
  FETCH_DEFAULT: 10000,
  /** Single DNS lookup (5 seconds) */
  DNS_LOOKUP: 5000,
  /** Whole SMTP probe session (10 seconds) */
  SMTP_SESSION: 10000,
  /** Waiting for a free outbound connection slot (60 seconds) */
  QUOTA_ACQUIRE: 60000,
} as const;
