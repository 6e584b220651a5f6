import { sleep } from './sleep.util';
import type { BackoffStrategy } from '../../config/constants';

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number; aborted: boolean };

export interface BackoffOptions {
  delayMs: number;
  backoff?: BackoffStrategy;
  multiplier?: number;
  maxDelayMs?: number;
}

export interface RetryOptions extends BackoffOptions {
  maxAttempts: number;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
  onAttemptFailed?: (
    error: unknown,
    attempt: number,
    nextDelayMs: number | null,
  ) => void;
}

/**
 * Delay to wait after the given (1-based) failed attempt.
 */
export function computeRetryDelay(
  failedAttempt: number,
  options: BackoffOptions,
): number {
  if (options.backoff !== 'exponential') {
    return options.delayMs;
  }

  const multiplier = options.multiplier ?? 2;
  const delayMs = options.delayMs * multiplier ** (failedAttempt - 1);
  return options.maxDelayMs === undefined
    ? delayMs
    : Math.min(delayMs, options.maxDelayMs);
}

/**
 * Runs `operation` up to `maxAttempts` times, waiting between attempts.
 * Never throws: the outcome is returned as a {@link RetryResult}. No attempt
 * starts once `signal` has aborted, and an abort cuts the current wait short.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryResult<T>> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;
  let attempts = 0;

  while (attempts < options.maxAttempts) {
    if (options.signal?.aborted) {
      return { ok: false, error: lastError, attempts, aborted: true };
    }

    attempts += 1;
    try {
      const value = await operation(attempts);
      return { ok: true, value, attempts };
    } catch (error) {
      lastError = error;
    }

    const nextDelayMs =
      attempts < options.maxAttempts
        ? computeRetryDelay(attempts, options)
        : null;
    options.onAttemptFailed?.(lastError, attempts, nextDelayMs);

    if (nextDelayMs !== null && !(await wait(nextDelayMs, options.signal))) {
      return { ok: false, error: lastError, attempts, aborted: true };
    }
  }

  return { ok: false, error: lastError, attempts, aborted: false };
}
