import type { ProviderError } from "../errors.js"
import { classifyError } from "./http.js"

export type RetryPolicy = {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 30_000,
}

export type RetryHooks = {
  sleep?: (ms: number) => Promise<void>
  random?: () => number
  onRetry?: (error: ProviderError, attempt: number, delayMs: number) => void
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/** `attempt` is the 1-based number of the attempt that just failed. */
export function shouldRetry(error: ProviderError, attempt: number, policy: RetryPolicy): boolean {
  if (!error.retryable) return false
  // Unknown failures get a single second chance
  const limit = error.kind === "Unknown" ? Math.min(2, policy.maxAttempts) : policy.maxAttempts
  return attempt < limit
}

export function backoffDelay(error: ProviderError, attempt: number, policy: RetryPolicy, random: () => number): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1))
  const jittered = Math.round(exponential * (0.5 + random() * 0.5))
  return error.retryAfterMs !== undefined ? Math.max(jittered, error.retryAfterMs) : jittered
}

export async function callWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt)
    } catch (e) {
      const error = classifyError(e)
      if (!shouldRetry(error, attempt, policy)) throw error
      const delayMs = backoffDelay(error, attempt, policy, hooks.random ?? Math.random)
      hooks.onRetry?.(error, attempt, delayMs)
      await (hooks.sleep ?? sleep)(delayMs)
    }
  }
}
