import { describe, it, expect } from 'vitest'
import { computeBackoff, DEFAULT_BACKOFF, type RetryPolicy } from '../src/utils/backoff.js'

const noJitter: RetryPolicy = { ...DEFAULT_BACKOFF, jitter: 0 }

describe('computeBackoff', () => {
  it('doubles from the initial delay up to the cap', () => {
    expect(computeBackoff(noJitter, 0)).toBe(30_000)
    expect(computeBackoff(noJitter, 1)).toBe(60_000)
    expect(computeBackoff(noJitter, 2)).toBe(120_000)
    expect(computeBackoff(noJitter, 10)).toBe(300_000)
  })

  it('applies jitter either way', () => {
    expect(computeBackoff(DEFAULT_BACKOFF, 0, () => 0)).toBe(22_500)
    expect(computeBackoff(DEFAULT_BACKOFF, 0, () => 0.5)).toBe(30_000)
  })

  it('gives up after maxAttempts', () => {
    const policy = { ...noJitter, maxAttempts: 3 }
    expect(computeBackoff(policy, 2)).toBe(120_000)
    expect(computeBackoff(policy, 3)).toBeNull()
  })
})
