import { isClassifiedError } from '../errors';
import * as logger from '../logging';

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export type RetryStatusCallback = (attempt: number, previousError: unknown) => void;

export interface RetryOptions {
  signal?: AbortSignal | undefined;
  /**
   * Invoked before every re-invocation of the operation (attempt 2 onwards).
   */
  onRetry?: RetryStatusCallback | undefined;
}

/** Background and non-interactive fetches. */
export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  multiplier: 2,
});

/** Interactive paths where a user is waiting on the result. */
export const QUICK_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
  maxAttempts: 2,
  baseDelayMs: 500,
  maxDelayMs: 5_000,
  multiplier: 2,
});

export function computeBackoff(config: RetryConfig, attempt: number): number {
  const delay = config.baseDelayMs * config.multiplier ** (attempt - 1);
  return Math.min(delay, config.maxDelayMs);
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error('Operation was aborted');
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) {
        reject(abortReason(signal));
      }
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function delayFor(error: unknown, config: RetryConfig, attempt: number): number {
  if (isClassifiedError(error) && error.retryAfterMs > 0) {
    return error.retryAfterMs;
  }
  return computeBackoff(config, attempt);
}

/**
 * Runs `fn` until it succeeds, a non-retryable classified error is thrown, or
 * `config.maxAttempts` is reached.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const { signal, onRetry } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    if (attempt > 1) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      onRetry?.(attempt, lastError);
    }

    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (signal?.aborted) {
        throw abortReason(signal);
      }

      if (isClassifiedError(error) && !error.retryable) {
        throw error;
      }

      if (attempt >= config.maxAttempts) {
        break;
      }

      const delay = delayFor(error, config, attempt);
      logger.debug(
        `${operation} failed (attempt ${attempt}/${config.maxAttempts}), retrying in ${delay}ms`
      );
      await wait(delay, signal);
    }
  }

  if (isClassifiedError(lastError)) {
    lastError.annotateAttempts(config.maxAttempts);
    throw lastError;
  }

  const message = lastError instanceof Error ? lastError.message : String(lastError);
  throw new Error(`${operation} failed after ${config.maxAttempts} attempts: ${message}`, {
    cause: lastError,
  });
}

export function withQuickRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  return withRetry(operation, fn, QUICK_RETRY_CONFIG, options);
}

export function withDefaultRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  return withRetry(operation, fn, DEFAULT_RETRY_CONFIG, options);
}
