import { Hono } from "hono"

import type { StateCoordinator } from "~/lib/runtime-state"

export const createMetricsRoutes = (coordinator: StateCoordinator) => {
  const routes = new Hono()

  routes.get("/", async (c) => c.json(await coordinator.statusSnapshot()))

  return routes
}
