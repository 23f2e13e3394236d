/**
 * Bounded retry for startup connections (MongoDB, MySQL).
 *
 * The delay doubles after each failed attempt, with +/-20% jitter so
 * forked workers started together do not reconnect in lockstep. Errors the
 * caller's shouldRetry rejects are rethrown at once. The worker loop keeps
 * its own unbounded backoff for Redis.
 */
import { logger } from "../../monitoring/logger";
import { errorMessage } from "../errors/service.error";

export interface RetryOptions {
  /** Attempts including the first */
  maxAttempts: number;
  initialDelayMs: number;
  label?: string;
  /** Default: retry every error */
  shouldRetry?: (error: unknown) => boolean;
}

export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxAttempts, initialDelayMs, label = "operation", shouldRetry = () => true } = options;
  let delay = initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!shouldRetry(error)) {
        logger.error({ attempt, error: errorMessage(error), label }, `${label} failed with a permanent error`);
        throw error;
      }
      if (attempt >= maxAttempts) {
        logger.error(
          { attempt, maxAttempts, error: errorMessage(error), label },
          `${label} failed after ${maxAttempts} attempts`
        );
        throw error;
      }

      const wait = Math.round(delay * (0.8 + Math.random() * 0.4));
      logger.warn(
        { attempt, maxAttempts, delay: wait, error: errorMessage(error), label },
        `${label} attempt ${attempt} failed, retrying in ${wait}ms`
      );
      await sleep(wait);
      delay *= 2;
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
