export type Identity = string | number

export type TurnRole = "user" | "assistant"

export interface Turn {
  readonly role: TurnRole
  readonly text: string
  readonly timestamp: number
}

export const COUNTER_NAMES = [
  "messages_processed",
  "images_analyzed",
  "images_generated",
  "errors",
] as const

export type CounterName = (typeof COUNTER_NAMES)[number]

export type ImageEventKind = "analyzed" | "generated"

export type CounterValues = Readonly<Record<CounterName, number>>

export interface StatsSnapshot extends CounterValues {
  uptime_seconds: number
  started_at: string
}

export interface StatusSnapshot extends StatsSnapshot {
  uptime_formatted: string
  active_users: number
  context_size_total: number
}

export interface ConversationSize {
  identity: string
  turns: number
}

export type MessageAdmission =
  | { status: "admitted"; context: ReadonlyArray<Turn> }
  | { status: "rate_limited"; retryAfterMs: number }

export type Admission =
  | { status: "admitted" }
  | { status: "rate_limited"; retryAfterMs: number }

export interface RateLimiterOptions {
  windowMs: number
  maxRequests: number
}

export interface ContextStoreOptions {
  maxTurns: number
  maxIdentities: number
}

export interface StateCoordinatorOptions {
  rateLimit: RateLimiterOptions
  context: ContextStoreOptions
  clock?: () => number
}
