import { invariant } from "~/lib/error"

import type {
  ContextStoreOptions,
  ConversationSize,
  Identity,
  Turn,
} from "./types"

export const DEFAULT_CONTEXT_OPTIONS: ContextStoreOptions = {
  maxTurns: 20,
  maxIdentities: 10_000,
}

/**
 * Per-identity conversation log, bounded in both directions: each log keeps
 * at most `maxTurns` turns (oldest dropped first) and at most `maxIdentities`
 * logs are kept (least recently appended dropped first).
 */
export class ContextStore {
  // Map iteration order doubles as the recency order for identity eviction
  private contexts: Map<string, Array<Turn>> = new Map()
  private readonly maxTurns: number
  private readonly maxIdentities: number

  constructor(options: Partial<ContextStoreOptions> = {}) {
    const { maxTurns, maxIdentities } = {
      ...DEFAULT_CONTEXT_OPTIONS,
      ...options,
    }
    invariant(maxTurns > 0, "Context bound must be positive")
    invariant(maxIdentities > 0, "Identity bound must be positive")
    this.maxTurns = maxTurns
    this.maxIdentities = maxIdentities
  }

  append(identity: Identity, turn: Turn): void {
    const key = String(identity)
    const context = this.contexts.get(key) ?? []

    // Re-insert so the identity moves to the most recent end
    this.contexts.delete(key)
    context.push({ ...turn })
    if (context.length > this.maxTurns) {
      context.splice(0, context.length - this.maxTurns)
    }
    this.contexts.set(key, context)

    this.evictOverflow()
  }

  snapshot(identity: Identity): ReadonlyArray<Turn> {
    const context = this.contexts.get(String(identity))
    if (!context) return Object.freeze([])
    return Object.freeze(context.map((turn) => Object.freeze({ ...turn })))
  }

  has(identity: Identity): boolean {
    return this.contexts.has(String(identity))
  }

  clear(identity: Identity): void {
    this.contexts.delete(String(identity))
  }

  identityCount(): number {
    return this.contexts.size
  }

  totalTurns(): number {
    let total = 0
    for (const context of this.contexts.values()) {
      total += context.length
    }
    return total
  }

  sizes(): Array<ConversationSize> {
    return [...this.contexts].map(([identity, context]) => ({
      identity,
      turns: context.length,
    }))
  }

  private evictOverflow(): void {
    for (const key of this.contexts.keys()) {
      if (this.contexts.size <= this.maxIdentities) return
      this.contexts.delete(key)
    }
  }
}
