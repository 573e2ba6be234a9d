import {EvalError} from '../errors.js'
import {sleep, throwIfAborted} from './cancellation.js'

/**
 * Bounded retry with an explicit backoff schedule.
 *
 * `backoffMs[i]` is the wait after the (i+1)-th failed attempt; the last
 * entry is reused when there are more attempts than entries.
 */
export type RetryPolicy = {
  maxAttempts: number;
  backoffMs: number[];
  isRetryable?: (error: unknown) => boolean;
}

export type RetryOptions = {
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function isTransient(error: unknown): boolean {
  return error instanceof EvalError && error.transient
}

export function backoffDelay(policy: RetryPolicy, failedAttempt: number): number {
  if (policy.backoffMs.length === 0) {
    return 0
  }

  return policy.backoffMs[Math.min(failedAttempt - 1, policy.backoffMs.length - 1)]
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options?: RetryOptions
): Promise<T> {
  const isRetryable = policy.isRetryable ?? isTransient
  const maxAttempts = Math.max(1, policy.maxAttempts)

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options?.signal)
    try {
      return await fn(attempt)
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryable(error)) {
        throw error
      }

      const delayMs = backoffDelay(policy, attempt)
      options?.onRetry?.(error, attempt, delayMs)
      await sleep(delayMs, options?.signal)
    }
  }
}
