import { describe, test, expect } from "vitest"

import { InvariantViolation } from "~/lib/error"
import { StatsCounter } from "~/lib/runtime-state"

describe("StatsCounter", () => {
  test("starts every counter at zero", () => {
    const stats = new StatsCounter(0)

    expect(stats.snapshot(0)).toMatchObject({
      messages_processed: 0,
      images_analyzed: 0,
      images_generated: 0,
      errors: 0,
    })
  })

  test("increments the named counter only", () => {
    const stats = new StatsCounter(0)
    stats.increment("errors")
    stats.increment("errors")
    stats.increment("images_generated")

    expect(stats.snapshot(0)).toMatchObject({
      errors: 2,
      images_generated: 1,
      messages_processed: 0,
    })
  })

  test("unknown counter names fail fast", () => {
    const stats = new StatsCounter(0)

    expect(() => stats.increment("messages_dropped")).toThrow(
      InvariantViolation,
    )
    expect(stats.snapshot(0)).toMatchObject({
      messages_processed: 0,
      images_analyzed: 0,
      images_generated: 0,
      errors: 0,
    })
  })

  test("snapshot derives uptime from the start timestamp", () => {
    const stats = new StatsCounter(Date.UTC(2024, 0, 1))
    stats.increment("messages_processed")

    expect(stats.snapshot(Date.UTC(2024, 0, 1) + 90_500)).toEqual({
      messages_processed: 1,
      images_analyzed: 0,
      images_generated: 0,
      errors: 0,
      uptime_seconds: 90,
      started_at: "2024-01-01T00:00:00.000Z",
    })
  })

  test("snapshot does not change with later increments", () => {
    const stats = new StatsCounter(0)
    const before = stats.snapshot(1000)
    stats.increment("errors")

    expect(before.errors).toBe(0)
    expect(stats.snapshot(1000).errors).toBe(1)
  })
})
