/**
 * Retry with Exponential Backoff
 *
 * Generic retry utility used by components that make external calls
 * (agency pages, Companies House). BullMQ handles job-level retries;
 * this is for sub-operation retries.
 */
import { logger } from "../../monitoring/logger";

export interface RetryOptions {
  /** Maximum number of attempts (including the first) */
  maxAttempts: number;
  /** Initial delay in milliseconds before first retry */
  initialDelayMs: number;
  /** Multiply delay by this factor on each retry (default: 2) */
  backoffFactor?: number;
  /** Optional label for log messages */
  label?: string;
  /** Errors for which this returns false are rethrown without another attempt */
  shouldRetry?: (error: Error) => boolean;
  /** Extra multiplier on the computed delay for a given error (e.g. HTTP 429) */
  delayMultiplier?: (error: Error) => number;
  /** Called before each retry sleep */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Jitter ratio applied to each delay (default: 0.2) */
  jitter?: number;
}

/**
 * Executes an async function with exponential backoff retry.
 *
 * @returns The result of fn() on success
 * @throws The last error if all attempts are exhausted or the error is not retryable
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxAttempts,
    initialDelayMs,
    backoffFactor = 2,
    label = "operation",
    shouldRetry = () => true,
    delayMultiplier = () => 1,
    onRetry,
    jitter = 0.2,
  } = options;
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!shouldRetry(lastError)) {
        logger.debug(
          { attempt, error: lastError.message, label },
          `${label} failed with a non-retryable error`
        );
        throw lastError;
      }

      if (attempt === maxAttempts) {
        logger.warn(
          { attempt, maxAttempts, error: lastError.message, label },
          `${label} failed after ${maxAttempts} attempts`
        );
        throw lastError;
      }

      const delay =
        initialDelayMs * Math.pow(backoffFactor, attempt - 1) * delayMultiplier(lastError);
      // Add jitter (±20% by default) to prevent thundering herd
      const offset = delay * jitter * (Math.random() * 2 - 1);
      const actualDelay = Math.max(0, Math.round(delay + offset));

      logger.warn(
        { attempt, maxAttempts, delay: actualDelay, error: lastError.message, label },
        `${label} attempt ${attempt} failed, retrying in ${actualDelay}ms`
      );

      onRetry?.(lastError, attempt, actualDelay);
      await sleep(actualDelay);
    }
  }

  // This should never be reached, but TypeScript needs it
  throw lastError ?? new Error(`${label} was not attempted`);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
