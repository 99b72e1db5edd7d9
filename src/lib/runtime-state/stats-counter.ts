import { InvariantViolation } from "~/lib/error"

import {
  COUNTER_NAMES,
  type CounterName,
  type StatsSnapshot,
} from "./types"

const KNOWN_COUNTERS: ReadonlyArray<string> = COUNTER_NAMES

const isCounterName = (name: string): name is CounterName =>
  KNOWN_COUNTERS.includes(name)

export class StatsCounter {
  private counters: Record<CounterName, number> = {
    messages_processed: 0,
    images_analyzed: 0,
    images_generated: 0,
    errors: 0,
  }

  readonly startedAt: number

  constructor(startedAt: number = Date.now()) {
    this.startedAt = startedAt
  }

  // Accepts plain strings so names coming from untyped callers are checked too
  increment(name: CounterName | (string & {})): void {
    if (!isCounterName(name)) {
      throw new InvariantViolation(`Unknown stats counter "${name}"`)
    }
    this.counters[name] += 1
  }

  snapshot(now: number): StatsSnapshot {
    return {
      ...this.counters,
      uptime_seconds: Math.max(0, Math.floor((now - this.startedAt) / 1000)),
      started_at: new Date(this.startedAt).toISOString(),
    }
  }
}
