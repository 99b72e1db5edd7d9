import { describe, test, expect } from "vitest"

import { InvariantViolation } from "~/lib/error"
import { RateLimiter } from "~/lib/runtime-state"

const SECOND = 1000

describe("RateLimiter", () => {
  test("admits up to the limit, then rejects until the window rolls", () => {
    const limiter = new RateLimiter({ windowMs: 60 * SECOND, maxRequests: 2 })

    expect(limiter.admit("u1", 0)).toBe(true)
    expect(limiter.admit("u1", 1 * SECOND)).toBe(true)
    expect(limiter.admit("u1", 2 * SECOND)).toBe(false)
    expect(limiter.admit("u1", 61 * SECOND)).toBe(true)
  })

  test("admits N and rejects the N+1th message inside the window", () => {
    const limiter = new RateLimiter({ windowMs: 60 * SECOND, maxRequests: 10 })

    const results = Array.from({ length: 11 }, (_, i) =>
      limiter.admit(42, i * SECOND),
    )

    expect(results.slice(0, 10).every(Boolean)).toBe(true)
    expect(results[10]).toBe(false)
    expect(limiter.admit(42, 70 * SECOND)).toBe(true)
  })

  test("rejection records nothing", () => {
    const limiter = new RateLimiter({ windowMs: 10 * SECOND, maxRequests: 1 })

    expect(limiter.admit("u1", 0)).toBe(true)
    expect(limiter.admit("u1", 5 * SECOND)).toBe(false)
    expect(limiter.count("u1")).toBe(1)
    // Had the rejected call been recorded, t=10s would still be blocked by it
    expect(limiter.admit("u1", 10 * SECOND)).toBe(true)
  })

  test("retains only the timestamps inside the trailing window", () => {
    const limiter = new RateLimiter({ windowMs: 10 * SECOND, maxRequests: 100 })

    for (const t of [0, 2, 4, 6, 8, 10, 12, 14]) {
      limiter.admit("u1", t * SECOND)
    }

    // At t=14s the window is (4s, 14s]: 6, 8, 10, 12, 14
    expect(limiter.count("u1")).toBe(5)
  })

  test("identities are tracked independently", () => {
    const limiter = new RateLimiter({ windowMs: 60 * SECOND, maxRequests: 1 })

    expect(limiter.admit("a", 0)).toBe(true)
    expect(limiter.admit("b", 0)).toBe(true)
    expect(limiter.admit("a", 1)).toBe(false)
    expect(limiter.count("unknown")).toBe(0)
  })

  test("numeric and string identities share a key", () => {
    const limiter = new RateLimiter({ windowMs: 60 * SECOND, maxRequests: 1 })

    expect(limiter.admit(7, 0)).toBe(true)
    expect(limiter.admit("7", 1)).toBe(false)
  })

  test("retryAfterMs reports when the oldest request leaves the window", () => {
    const limiter = new RateLimiter({ windowMs: 60 * SECOND, maxRequests: 2 })

    expect(limiter.retryAfterMs("u1", 0)).toBe(0)
    limiter.admit("u1", 0)
    limiter.admit("u1", 1 * SECOND)

    expect(limiter.retryAfterMs("u1", 2 * SECOND)).toBe(58 * SECOND)
  })

  test("sweep forgets identities whose window is empty", () => {
    const limiter = new RateLimiter({ windowMs: 60 * SECOND, maxRequests: 5 })
    limiter.admit("old", 0)
    limiter.admit("recent", 50 * SECOND)

    expect(limiter.sweep(90 * SECOND)).toBe(1)
    expect(limiter.size).toBe(1)
    expect(limiter.count("recent")).toBe(1)
  })

  test("rejects non-positive limits", () => {
    expect(() => new RateLimiter({ windowMs: 0, maxRequests: 1 })).toThrow(
      InvariantViolation,
    )
    expect(() => new RateLimiter({ windowMs: 1000, maxRequests: 0 })).toThrow(
      InvariantViolation,
    )
  })
})
