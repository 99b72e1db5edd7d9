import { Hono } from "hono"

import type { AppConfig } from "~/lib/config"
import type { StateCoordinator } from "~/lib/runtime-state"

import { createHandlerLogger } from "~/lib/logger"

const logger = createHandlerLogger("health")

export const HEALTH_TIMEOUT_MS = 1_000

const reachable = async (
  coordinator: StateCoordinator,
  timeoutMs: number,
): Promise<boolean> => {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs)
  })

  try {
    return await Promise.race([coordinator.ping().then(() => true), timeout])
  } finally {
    clearTimeout(timer)
  }
}

export const createHealthRoutes = (
  coordinator: StateCoordinator,
  config: AppConfig,
  timeoutMs = HEALTH_TIMEOUT_MS,
) => {
  const routes = new Hono()

  routes.get("/", async (c) => {
    const healthy = await reachable(coordinator, timeoutMs)
    if (!healthy) {
      logger.warn(`State coordinator did not respond within ${timeoutMs}ms`)
    }

    return c.json(
      {
        status: healthy ? "healthy" : "unhealthy",
        timestamp: new Date().toISOString(),
        services: {
          coordinator: healthy ? "reachable" : "unreachable",
          gemini_api: config.geminiApiKey ? "configured" : "missing",
          telegram_api: config.telegramToken ? "configured" : "missing",
        },
      },
      healthy ? 200 : 503,
    )
  })

  return routes
}
