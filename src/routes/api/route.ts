import { Hono } from "hono"

import type { StateCoordinator } from "~/lib/runtime-state"

import { percentage } from "~/lib/format"

export const API_VERSION = "1.0.0"

export const ENDPOINTS = {
  health: "/health",
  status: "/status",
  metrics: "/metrics",
  api_info: "/api/info",
  stats_summary: "/api/stats/summary",
}

export const createApiRoutes = (coordinator: StateCoordinator) => {
  const routes = new Hono()

  routes.get("/info", (c) =>
    c.json({
      api_version: API_VERSION,
      bot_name: "Advanced Gemini AI Bot",
      description: "Telegram bot with Gemini AI integration",
      features: [
        "AI-powered conversations",
        "Image generation with Gemini",
        "Image analysis and recognition",
        "Admin control panel",
        "Real-time status monitoring",
        "Rate limiting",
      ],
      endpoints: ENDPOINTS,
      timestamp: new Date().toISOString(),
    }),
  )

  routes.get("/stats/summary", async (c) => {
    const snapshot = await coordinator.statusSnapshot()
    return c.json({
      online: true,
      uptime_hours: Math.round((snapshot.uptime_seconds / 3600) * 100) / 100,
      total_messages: snapshot.messages_processed,
      total_images_processed:
        snapshot.images_analyzed + snapshot.images_generated,
      active_users: snapshot.active_users,
      error_rate: percentage(snapshot.errors, snapshot.messages_processed),
      last_updated: new Date().toISOString(),
    })
  })

  return routes
}
