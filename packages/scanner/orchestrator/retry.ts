// Bounded exponential back-off for provider calls

import type { Clock } from '../utils/clock.js';
import { CancelledError, RetryExhaustedError, ValidationError } from '../utils/errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
}

export interface RetryOptions {
  clock: Clock;
  signal?: AbortSignal;
  /** Used in the RetryExhaustedError message */
  label: string;
  /** Return false to stop retrying and rethrow the error as-is. */
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

/** Delay before attempt `attempt + 1`; no jitter so tests can assert exact waits. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * policy.backoffFactor ** (attempt - 1));
}

function defaultShouldRetry(err: unknown): boolean {
  return !(err instanceof ValidationError) && !(err instanceof CancelledError);
}

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const { clock, signal, label, onRetry } = options;
  const shouldRetry = options.shouldRetry ?? defaultShouldRetry;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) throw new CancelledError();
    try {
      const value = await operation(attempt);
      return { value, attempts: attempt };
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      if (signal?.aborted) throw new CancelledError();
      if (!shouldRetry(err)) throw err;
      lastError = err;
      if (attempt < maxAttempts) {
        const delayMs = backoffDelay(policy, attempt);
        onRetry?.({ attempt, delayMs, error: err });
        await clock.sleep(delayMs, signal);
      }
    }
  }

  throw new RetryExhaustedError(label, maxAttempts, lastError);
}
