/**
 * Retry Utilities
 *
 * Retry with exponential backoff for transient upstream failures in
 * generation calls (reviewers, rewrite, research synthesis).
 */

import { APICallError } from 'ai';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { RETRY_CONFIG } from './config';

export { RETRY_CONFIG } from './config';

// ============================================================================
// Types
// ============================================================================

export interface RetryOptions {
  /** Total attempts including the first call (default: 3) */
  readonly maxAttempts?: number;
  /** Delay in ms before the first retry; doubles after each failure (default: 10000) */
  readonly initialDelayMs?: number;
  /** Context for logging (e.g., "Editor review" or "Rewrite") */
  readonly context?: string;
  /** Custom function to determine if an error is retryable (default: isRetryableError) */
  readonly shouldRetry?: (error: unknown) => boolean;
  /** Replaces the real timer, so tests can observe delays without waiting */
  readonly sleep?: (ms: number) => Promise<void>;
  readonly logger?: Logger;
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Known transient error patterns that should trigger a retry.
 */
const RETRYABLE_ERROR_PATTERNS = [
  // Rate limiting
  /rate.?limit/i,
  /too.?many.?requests/i,
  /\b429\b/,
  // Network issues
  /network/i,
  /fetch.*fail/i,
  /ETIMEDOUT/,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /socket.?hang.?up/i,
  /SSL/,
  /DECRYPTION_FAILED/,
  // Server errors (5xx)
  /\b5\d{2}\b/,
  /internal.?server.?error/i,
  /service.?unavailable/i,
  /bad.?gateway/i,
  // Provider-side load
  /overloaded/i,
  /capacity/i,
  /temporarily/i,
];

function statusOf(error: unknown): number | undefined {
  if (APICallError.isInstance(error)) return error.statusCode;
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Determines if an error is a transient upstream failure worth retrying.
 *
 * @returns true if the error appears to be transient
 */
export function isRetryableError(error: unknown): boolean {
  if (!error) return false;

  // A timeout means the budget was too short; retrying only repeats the wait
  if (error instanceof DOMException && error.name === 'TimeoutError') {
    return false;
  }

  if (APICallError.isInstance(error) && error.isRetryable) {
    return true;
  }

  const status = statusOf(error);
  if (status === 429 || (status !== undefined && status >= 500 && status < 600)) {
    return true;
  }

  const message = error instanceof Error ? error.message : String(error);
  return RETRYABLE_ERROR_PATTERNS.some((pattern) => pattern.test(message));
}

// ============================================================================
// Retry Logic
// ============================================================================

/**
 * Delay before retry number `attempt + 1`: initial × multiplier^attempt.
 */
export function calculateDelay(attempt: number, initialDelayMs: number): number {
  return initialDelayMs * Math.pow(RETRY_CONFIG.BACKOFF_MULTIPLIER, attempt);
}

/**
 * Sleeps for the specified duration.
 *
 * @example
 * await sleep(1000); // Wait 1 second
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Executes an async function with retry logic and exponential backoff.
 *
 * Only retries transient errors (rate limits, network issues, server errors).
 * Anything else fails immediately.
 *
 * @throws The last error once all attempts fail, or immediately for non-retryable errors
 *
 * @example
 * const text = await withRetry(
 *   () => generator.generate(prompt),
 *   { context: 'Editor review' }
 * );
 * // Waits 10s, then 20s between the three attempts
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = RETRY_CONFIG.MAX_ATTEMPTS,
    initialDelayMs = RETRY_CONFIG.INITIAL_DELAY_MS,
    context = 'operation',
    shouldRetry = isRetryableError,
    sleep: wait = sleep,
    logger: log = createPrefixedLogger('[Retry]'),
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      const message = error instanceof Error ? error.message : String(error);

      if (!shouldRetry(error)) {
        throw error;
      }

      if (attempt >= maxAttempts - 1) {
        log.warn(`${context} failed after ${maxAttempts} attempts: ${message}`);
        throw error;
      }

      const delay = calculateDelay(attempt, initialDelayMs);
      log.info(
        `${context} failed (attempt ${attempt + 1}/${maxAttempts}), retrying in ${delay}ms: ${message}`
      );
      await wait(delay);
    }
  }

  // Only reachable when maxAttempts < 1
  throw lastError;
}
