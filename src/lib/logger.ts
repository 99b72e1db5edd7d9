import consola, { LogLevels, type ConsolaInstance, type LogType } from "consola"

// Tagged instances copy the level when created, so keep them in step
const handlerLoggers = new Set<ConsolaInstance>()

const isLogType = (value: string): value is LogType => value in LogLevels

/**
 * Applies a LOG_LEVEL name ("debug", "info", "warn", ...) to consola and to
 * every logger made by `createHandlerLogger`. Unknown names leave the level
 * untouched.
 */
export function setLogLevel(name: string | undefined): void {
  const normalized = name?.trim().toLowerCase()
  if (!normalized) return

  const alias = normalized === "warning" ? "warn" : normalized
  if (!isLogType(alias)) {
    consola.warn(`Unknown LOG_LEVEL "${name}", keeping ${consola.level}`)
    return
  }

  consola.level = LogLevels[alias]
  for (const logger of handlerLoggers) {
    logger.level = LogLevels[alias]
  }
}

export const createHandlerLogger = (tag: string): ConsolaInstance => {
  const logger = consola.withTag(tag)
  handlerLoggers.add(logger)
  return logger
}
