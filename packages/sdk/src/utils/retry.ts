import { APIError, describeError } from '../errors.ts';
import type { Logger } from '../logger.ts';

export interface RetryOptions {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  /** Fixed pause between attempts. */
  delaySeconds: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Network failures, timeouts and 5xx responses. Client errors and
 * everything raised by our own validation go straight to the caller.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof APIError && error.retryable;
}

export function sleep(seconds: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, seconds * 1000));
}

/**
 * Runs `operation` up to `maxAttempts` times with a constant delay between
 * attempts. The error from the last attempt is rethrown unchanged.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const retryIf = options.retryIf ?? isRetryableError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!retryIf(error) || attempt >= options.maxAttempts) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      await sleep(options.delaySeconds);
    }
  }
}

/**
 * Retry options for one labelled call, taken from the run's settings.
 * Each retry is logged as a warning.
 */
export function retryPolicy(
  settings: { maxRetries: number; retryDelay: number },
  logger: Logger,
  operation: string
): RetryOptions {
  return {
    maxAttempts: settings.maxRetries,
    delaySeconds: settings.retryDelay,
    onRetry: (error, attempt) => {
      logger.warn(
        `${operation} failed (attempt ${attempt}/${settings.maxRetries}): ${describeError(error)}; retrying in ${settings.retryDelay}s`
      );
    },
  };
}
