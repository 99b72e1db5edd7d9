import { Hono } from "hono"

import type { StateCoordinator } from "~/lib/runtime-state"

import { getBotInfo, type AppConfig } from "~/lib/config"

export const createStatusRoutes = (
  coordinator: StateCoordinator,
  config: AppConfig,
) => {
  const routes = new Hono()

  routes.get("/", async (c) => {
    const snapshot = await coordinator.statusSnapshot()
    return c.json({
      status: "online",
      ...snapshot,
      bot_info: getBotInfo(config),
      timestamp: new Date().toISOString(),
    })
  })

  return routes
}
