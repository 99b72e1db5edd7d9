import { formatUptime } from "~/lib/format"
import { Mutex } from "~/lib/mutex"

import type {
  Admission,
  ConversationSize,
  Identity,
  ImageEventKind,
  MessageAdmission,
  StateCoordinatorOptions,
  StatusSnapshot,
  Turn,
} from "./types"

import { ContextStore } from "./context-store"
import { RateLimiter } from "./rate-limiter"
import { StatsCounter } from "./stats-counter"

const IMAGE_COUNTERS = {
  analyzed: "images_analyzed",
  generated: "images_generated",
} as const

/**
 * The only way into the bot's shared state. The processing loop and the
 * status server both hold a reference to one instance; every operation runs
 * as a single critical section on the same lock and never awaits I/O inside
 * it, so readers always see whole updates.
 */
export class StateCoordinator {
  private readonly lock = new Mutex()
  private readonly rateLimiter: RateLimiter
  private readonly contexts: ContextStore
  private readonly stats: StatsCounter
  private readonly clock: () => number

  constructor(options: StateCoordinatorOptions) {
    this.clock = options.clock ?? Date.now
    this.rateLimiter = new RateLimiter(options.rateLimit)
    this.contexts = new ContextStore(options.context)
    this.stats = new StatsCounter(this.clock())
  }

  get startedAt(): number {
    return this.stats.startedAt
  }

  /**
   * Admits a text message and records it as the user's next turn. The
   * returned context already contains that turn.
   */
  tryHandleMessage(
    identity: Identity,
    text: string,
    now: number = this.clock(),
  ): Promise<MessageAdmission> {
    return this.lock.runExclusive<MessageAdmission>(() => {
      if (!this.rateLimiter.admit(identity, now)) {
        return {
          status: "rate_limited",
          retryAfterMs: this.rateLimiter.retryAfterMs(identity, now),
        }
      }

      this.contexts.append(identity, { role: "user", text, timestamp: now })
      this.stats.increment("messages_processed")
      return { status: "admitted", context: this.contexts.snapshot(identity) }
    })
  }

  /** Rate-limit check for requests that add no conversation turn. */
  tryAdmit(identity: Identity, now: number = this.clock()): Promise<Admission> {
    return this.lock.runExclusive<Admission>(() => {
      if (this.rateLimiter.admit(identity, now)) {
        return { status: "admitted" }
      }
      return {
        status: "rate_limited",
        retryAfterMs: this.rateLimiter.retryAfterMs(identity, now),
      }
    })
  }

  /**
   * Appends the reply to a conversation that still exists. A conversation
   * evicted or cleared while the backend was answering stays gone.
   */
  recordAssistantTurn(
    identity: Identity,
    text: string,
    now: number = this.clock(),
  ): Promise<void> {
    return this.lock.runExclusive(() => {
      if (!this.contexts.has(identity)) return
      this.contexts.append(identity, {
        role: "assistant",
        text,
        timestamp: now,
      })
    })
  }

  recordImageEvent(kind: ImageEventKind): Promise<void> {
    return this.lock.runExclusive(() => {
      this.stats.increment(IMAGE_COUNTERS[kind])
    })
  }

  recordError(): Promise<void> {
    return this.lock.runExclusive(() => {
      this.stats.increment("errors")
    })
  }

  resetConversation(identity: Identity): Promise<void> {
    return this.lock.runExclusive(() => {
      this.contexts.clear(identity)
    })
  }

  conversation(identity: Identity): Promise<ReadonlyArray<Turn>> {
    return this.lock.runExclusive(() => this.contexts.snapshot(identity))
  }

  statusSnapshot(now: number = this.clock()): Promise<StatusSnapshot> {
    return this.lock.runExclusive(() => {
      const stats = this.stats.snapshot(now)
      return {
        ...stats,
        uptime_formatted: formatUptime(stats.uptime_seconds),
        active_users: this.contexts.identityCount(),
        context_size_total: this.contexts.totalTurns(),
      }
    })
  }

  /** Identities with the longest conversations first. */
  conversationSizes(limit = 10): Promise<Array<ConversationSize>> {
    return this.lock.runExclusive(() =>
      this.contexts
        .sizes()
        .sort((a, b) => b.turns - a.turns)
        .slice(0, limit),
    )
  }

  /** Drops rate-limit windows that no longer hold any request. */
  sweepIdle(now: number = this.clock()): Promise<number> {
    return this.lock.runExclusive(() => this.rateLimiter.sweep(now))
  }

  /** Resolves once the lock can be taken; used as a liveness probe. */
  async ping(): Promise<void> {
    await this.lock.runExclusive(() => undefined)
  }
}
