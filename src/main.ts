import { serve } from "@hono/node-server"
import consola from "consola"

import { UpdateHandler } from "./bot/handler"
import { ProcessingLoop } from "./bot/loop"
import {
  ConfigError,
  coordinatorOptions,
  loadConfig,
  reportConfigError,
  type AppConfig,
} from "./lib/config"
import { errorMessage } from "./lib/error"
import { setLogLevel } from "./lib/logger"
import { StateCoordinator } from "./lib/runtime-state"
import { createServer } from "./server"
import { GeminiBackend } from "./services/gemini/backend"
import { TelegramPlatform } from "./services/telegram/platform"

function readConfig(): AppConfig | undefined {
  try {
    return loadConfig()
  } catch (error) {
    if (error instanceof ConfigError) {
      reportConfigError(error)
      return undefined
    }
    throw error
  }
}

async function main(): Promise<void> {
  const config = readConfig()
  if (!config) {
    process.exitCode = 1
    return
  }
  setLogLevel(config.logLevel)

  const coordinator = new StateCoordinator(coordinatorOptions(config))
  consola.info(
    `Bot started at: ${new Date(coordinator.startedAt).toISOString()}`,
  )

  const server = createServer({ coordinator, config })
  const httpServer = serve(
    { fetch: server.fetch, port: config.statusPort },
    (info) => {
      consola.info(`Status server listening on http://localhost:${info.port}`)
    },
  )

  const platform = new TelegramPlatform(config.telegramToken)
  const loop = new ProcessingLoop({
    platform,
    coordinator,
    handler: new UpdateHandler({
      coordinator,
      platform,
      backend: new GeminiBackend(config.geminiApiKey),
      config,
    }),
  })

  let shuttingDown = false
  const shutdown = (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    consola.info(`Received ${signal}, shutting down`)
    loop
      .stop()
      .catch((error: unknown) => {
        consola.error("Processing loop failed during shutdown:", error)
      })
      .finally(() => {
        httpServer.close()
      })
  }
  process.once("SIGINT", () => shutdown("SIGINT"))
  process.once("SIGTERM", () => shutdown("SIGTERM"))

  try {
    await platform.dropPendingUpdates()
  } catch (error) {
    consola.warn("Could not drop pending updates:", errorMessage(error))
  }

  consola.info("Starting Telegram bot...")
  try {
    await loop.start()
  } finally {
    httpServer.close()
  }
}

main().catch((error: unknown) => {
  consola.error("Critical error:", error)
  process.exit(1)
})
