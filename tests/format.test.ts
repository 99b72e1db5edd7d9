import { describe, test, expect } from "vitest"

import {
  formatMessage,
  formatUptime,
  percentage,
  truncateText,
} from "~/lib/format"

describe("formatUptime", () => {
  test("shows only the non-zero units", () => {
    expect(formatUptime(0)).toBe("0m")
    expect(formatUptime(59)).toBe("0m")
    expect(formatUptime(60)).toBe("1m")
    expect(formatUptime(3600)).toBe("1h")
    expect(formatUptime(90_061)).toBe("1d 1h 1m")
    expect(formatUptime(86_400 + 120)).toBe("1d 2m")
  })
})

describe("formatMessage", () => {
  test("passes short text through", () => {
    expect(formatMessage("Hello there.", 100)).toBe("Hello there.")
  })

  test("replaces empty output", () => {
    expect(formatMessage("   ")).toBe("No response generated.")
  })

  test("cuts at the last sentence when it keeps most of the text", () => {
    const text = `${"a".repeat(80)}.${"b".repeat(50)}`

    expect(formatMessage(text, 100)).toBe(
      `${"a".repeat(80)}.\n\n... (truncated)`,
    )
  })

  test("cuts hard when the last sentence break is too early", () => {
    const text = `${"a".repeat(10)}.${"b".repeat(200)}`
    const result = formatMessage(text, 100)

    expect(result).toHaveLength(100)
    expect(result).toBe(`${"a".repeat(10)}.${"b".repeat(72)}\n\n... (truncated)`)
  })
})

describe("truncateText", () => {
  test("appends the suffix within the limit", () => {
    expect(truncateText("abcdefghij", 6)).toBe("abc...")
    expect(truncateText("abc", 6)).toBe("abc")
  })
})

describe("percentage", () => {
  test("rounds to two decimals and tolerates a zero whole", () => {
    expect(percentage(1, 3)).toBe(33.33)
    expect(percentage(2, 0)).toBe(200)
  })
})
