import type { Context } from "hono"

import consola from "consola"

export class HTTPError extends Error {
  response: Response

  constructor(message: string, response: Response) {
    super(message)
    this.name = "HTTPError"
    this.response = response
  }
}

/** The AI backend answered, but not with anything usable. */
export class BackendError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "BackendError"
  }
}

/**
 * Raised when shared state is used in a way the code never should, such as
 * incrementing a counter that does not exist. Callers are not expected to
 * recover from it.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message)
    this.name = "InvariantViolation"
  }
}

export function invariant(
  condition: unknown,
  message: string,
): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message)
  }
}

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error
  && (error.name === "AbortError" || error.name === "TimeoutError")

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

/** Logs an unexpected failure in a status route and answers with a JSON 500. */
export function forwardError(c: Context, error: unknown) {
  consola.error("Error occurred:", error)

  return c.json(
    {
      error: {
        message: errorMessage(error),
        type: "error",
      },
    },
    500,
  )
}
