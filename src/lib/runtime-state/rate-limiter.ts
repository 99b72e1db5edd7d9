import { invariant } from "~/lib/error"

import type { Identity, RateLimiterOptions } from "./types"

export const DEFAULT_RATE_LIMIT: RateLimiterOptions = {
  windowMs: 60_000,
  maxRequests: 10,
}

/**
 * Sliding-window limiter keyed by identity. Expired timestamps are dropped
 * lazily on every `admit` call for that identity.
 */
export class RateLimiter {
  private windows: Map<string, Array<number>> = new Map()
  private readonly windowMs: number
  private readonly maxRequests: number

  constructor(options: RateLimiterOptions = DEFAULT_RATE_LIMIT) {
    invariant(options.windowMs > 0, "Rate limit window must be positive")
    invariant(options.maxRequests > 0, "Rate limit max must be positive")
    this.windowMs = options.windowMs
    this.maxRequests = options.maxRequests
  }

  get size(): number {
    return this.windows.size
  }

  admit(identity: Identity, now: number): boolean {
    const key = String(identity)
    const window = this.prune(key, now)

    if (window.length >= this.maxRequests) {
      return false
    }

    window.push(now)
    this.windows.set(key, window)
    return true
  }

  /** Milliseconds until `identity` has a free slot; 0 when it has one now. */
  retryAfterMs(identity: Identity, now: number): number {
    const window = this.prune(String(identity), now)
    if (window.length < this.maxRequests) return 0

    const oldest = window[0]
    return Math.max(0, oldest + this.windowMs - now)
  }

  count(identity: Identity): number {
    return this.windows.get(String(identity))?.length ?? 0
  }

  /** Forgets identities with no request left inside the window. */
  sweep(now: number): number {
    let removed = 0
    for (const key of [...this.windows.keys()]) {
      if (this.prune(key, now).length === 0) {
        this.windows.delete(key)
        removed++
      }
    }
    return removed
  }

  private prune(key: string, now: number): Array<number> {
    const window = this.windows.get(key)
    if (!window) return []

    const windowStart = now - this.windowMs
    let firstLive = 0
    while (firstLive < window.length && window[firstLive] <= windowStart) {
      firstLive++
    }
    if (firstLive > 0) window.splice(0, firstLive)
    return window
  }
}
