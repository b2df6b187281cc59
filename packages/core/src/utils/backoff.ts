/**
 * Exponential Backoff Utility
 *
 * Computes delay for sync retry attempts with jitter.
 */

export interface RetryPolicy {
  initialMs: number
  maxMs: number
  factor: number
  /** Fraction of the delay applied as random jitter either way */
  jitter: number
  maxAttempts: number
}

/** Default retry policy for failed calendar syncs */
export const DEFAULT_BACKOFF: RetryPolicy = {
  initialMs: 30_000,
  maxMs: 5 * 60_000,
  factor: 2,
  jitter: 0.25,
  maxAttempts: Number.POSITIVE_INFINITY,
}

/**
 * Compute backoff delay for a given attempt number.
 *
 * @param policy - Retry policy configuration
 * @param attempt - Zero-based attempt number
 * @param random - Source of randomness in [0, 1)
 * @returns Delay in milliseconds, or null if maxAttempts exceeded
 */
export function computeBackoff(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number | null {
  if (attempt >= policy.maxAttempts) return null

  const base = policy.initialMs * Math.pow(policy.factor, attempt)
  const capped = Math.min(base, policy.maxMs)

  // Apply jitter: ±jitter% of the computed delay
  const jitterRange = capped * policy.jitter
  const jitterOffset = (random() * 2 - 1) * jitterRange

  return Math.round(capped + jitterOffset)
}
