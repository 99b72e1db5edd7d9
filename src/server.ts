import { Hono } from "hono"
import { cors } from "hono/cors"
import { logger } from "hono/logger"

import type { AppConfig } from "./lib/config"
import type { StateCoordinator } from "./lib/runtime-state"

import { forwardError } from "./lib/error"
import { ENDPOINTS, createApiRoutes } from "./routes/api/route"
import { createHealthRoutes } from "./routes/health/route"
import { createMetricsRoutes } from "./routes/metrics/route"
import { createStatusRoutes } from "./routes/status/route"

export interface StatusServerDeps {
  coordinator: StateCoordinator
  config: AppConfig
  healthTimeoutMs?: number
}

// Reachable without an API key so orchestrators can probe liveness
const PUBLIC_PATHS = new Set(["/", "/health"])

const withoutTrailingSlash = (path: string) =>
  path.length > 1 ? path.replace(/\/+$/, "") || "/" : path

/** Read-only HTTP surface over the coordinator's snapshots. */
export const createServer = ({
  coordinator,
  config,
  healthTimeoutMs,
}: StatusServerDeps) => {
  const server = new Hono()

  server.use(logger())
  server.use(cors())

  server.use(async (c, next) => {
    const apiKey = config.statusApiKey
    if (!apiKey || PUBLIC_PATHS.has(withoutTrailingSlash(c.req.path))) {
      await next()
      return
    }

    let provided = c.req.header("x-api-key")

    if (!provided) {
      const authHeader = c.req.header("Authorization")
      if (authHeader?.startsWith("Bearer ")) {
        provided = authHeader.slice(7)
      }
    }

    if (!provided || provided !== apiKey) {
      return c.json({ ok: false, error: "Unauthorized" }, 401)
    }

    await next()
  })

  server.get("/", (c) => c.text("Server running"))
  server.get("/favicon.ico", (c) => c.body(null, 204))

  server.route(
    "/health",
    createHealthRoutes(coordinator, config, healthTimeoutMs),
  )
  server.route("/status", createStatusRoutes(coordinator, config))
  server.route("/metrics", createMetricsRoutes(coordinator))
  server.route("/api", createApiRoutes(coordinator))

  server.notFound((c) =>
    c.json(
      {
        error: "Not found",
        message: "The requested endpoint was not found.",
        available_endpoints: Object.values(ENDPOINTS),
      },
      404,
    ),
  )

  server.onError((error, c) => forwardError(c, error))

  return server
}
