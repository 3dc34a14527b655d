import { CloneTransientFailure, toError } from '../errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 30_000;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Total attempts, including the first */
  maxRetries?: number;
  /** Fixed delay between attempts; not exponential */
  retryDelayMs?: number;
  sleep?: Sleep;
  label?: string;
  /** Runs after every failed attempt, before the delay */
  onAttemptFailed?: (error: Error, attempt: number) => Promise<void> | void;
}

export type RetryOutcome<T> =
  | { success: true; value: T; attempts: number }
  | { success: false; error: CloneTransientFailure; attempts: number };

/**
 * Run a network-bound operation up to `maxRetries` times with a fixed delay
 * between attempts. The delay is skipped after the final attempt.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<RetryOutcome<T>> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const wait = options.sleep ?? sleep;
  const label = options.label ?? 'operation';

  if (!Number.isInteger(maxRetries) || maxRetries < 1) {
    throw new RangeError(`maxRetries must be a positive integer, got ${maxRetries}`);
  }
  if (retryDelayMs < 0) {
    throw new RangeError(`retryDelayMs must not be negative, got ${retryDelayMs}`);
  }

  let lastError: Error = new Error(`${label} was not attempted`);

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      const value = await operation();
      if (attempt > 1) {
        logger.info(`${label} succeeded after retry`, { attempt, maxRetries });
      }
      return { success: true, value, attempts: attempt };
    } catch (err) {
      lastError = toError(err);

      logger.warn(`${label} failed`, {
        attempt,
        maxRetries,
        error: lastError.message,
      });

      if (options.onAttemptFailed) {
        await options.onAttemptFailed(lastError, attempt);
      }

      if (attempt < maxRetries) {
        await wait(retryDelayMs);
      }
    }
  }

  logger.error(`${label} failed permanently`, { attempts: maxRetries, error: lastError.message });

  return {
    success: false,
    attempts: maxRetries,
    error: new CloneTransientFailure(
      `${label} failed after ${maxRetries} attempt(s): ${lastError.message}`,
      maxRetries,
      { cause: lastError }
    ),
  };
}
