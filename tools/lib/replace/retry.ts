import { isRetryable } from "../core/errors"

export interface RetryPolicy {
  attempts: number // total tries, including the first
  baseDelayMs: number
  maxDelayMs: number
}

export const DEFAULT_RETRY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
}

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

/**
 * Delay before retry number `retry` (1-based): base * 2^(retry-1), capped
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (retry - 1))
}

/**
 * Run `task` until it succeeds, a non-retryable error is thrown, or the
 * policy's attempts are used up. `onRetry` sees each retryable failure.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: { sleep?: Sleep; onRetry?: (error: unknown, attempt: number, delayMs: number) => void } = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep
  let attempt = 1
  for (;;) {
    try {
      return await task(attempt)
    } catch (error) {
      if (!isRetryable(error) || attempt >= policy.attempts) throw error
      const delay = backoffDelay(policy, attempt)
      hooks.onRetry?.(error, attempt, delay)
      await wait(delay)
      attempt++
    }
  }
}
