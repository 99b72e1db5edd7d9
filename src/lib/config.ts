import consola from "consola"

import type { StateCoordinatorOptions } from "~/lib/runtime-state"

export interface AppConfig {
  telegramToken: string
  geminiApiKey: string
  adminId: string

  statusPort: number
  statusApiKey?: string
  botUsername: string

  maxMessageLength: number
  maxImageSize: number
  allowedImageTypes: Array<string>

  rateLimitMessages: number
  rateLimitWindowSeconds: number
  contextMaxTurns: number
  contextMaxIdentities: number

  backendTimeoutMs: number
  logLevel: string
}

export type Env = Record<string, string | undefined>

const REQUIRED_VARS: Record<string, string> = {
  TELEGRAM_BOT_TOKEN: "Your Telegram bot token",
  GEMINI_API_KEY: "Your Google Gemini API key",
  ADMIN_ID: "Your Telegram user ID for admin controls",
}

export class ConfigError extends Error {
  missing: Array<string>

  constructor(missing: Array<string>) {
    super(`Missing required environment variables: ${missing.join(", ")}`)
    this.name = "ConfigError"
    this.missing = missing
  }
}

const parseEnvInt = (
  env: Env,
  key: string,
  defaultValue: number,
): number => {
  const value = env[key]
  if (!value) return defaultValue
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) || parsed <= 0 ? defaultValue : parsed
}

export function loadConfig(env: Env = process.env): AppConfig {
  const missing = Object.keys(REQUIRED_VARS).filter((key) => !env[key]?.trim())
  if (missing.length > 0) {
    throw new ConfigError(missing)
  }

  return {
    telegramToken: env.TELEGRAM_BOT_TOKEN?.trim() ?? "",
    geminiApiKey: env.GEMINI_API_KEY?.trim() ?? "",
    adminId: env.ADMIN_ID?.trim() ?? "",

    statusPort: parseEnvInt(
      env,
      "STATUS_PORT",
      parseEnvInt(env, "WEBHOOK_PORT", 5000),
    ),
    statusApiKey: env.STATUS_API_KEY?.trim() || undefined,
    botUsername: env.BOT_USERNAME?.trim() || "GeminiAIBot",

    maxMessageLength: 4096,
    maxImageSize: 20 * 1024 * 1024,
    allowedImageTypes: ["image/jpeg", "image/png", "image/webp"],

    rateLimitMessages: parseEnvInt(env, "RATE_LIMIT_MESSAGES", 10),
    rateLimitWindowSeconds: parseEnvInt(env, "RATE_LIMIT_WINDOW", 60),
    contextMaxTurns: parseEnvInt(env, "CONTEXT_MAX_TURNS", 20),
    contextMaxIdentities: parseEnvInt(env, "CONTEXT_MAX_IDENTITIES", 10_000),

    backendTimeoutMs: parseEnvInt(env, "BACKEND_TIMEOUT_MS", 60_000),
    logLevel: env.LOG_LEVEL?.trim() || "info",
  }
}

export function reportConfigError(error: ConfigError): void {
  consola.error(error.message)
  consola.error("Please set the following environment variables:")
  for (const key of error.missing) {
    consola.error(`- ${key}: ${REQUIRED_VARS[key] ?? "required"}`)
  }
}

export const coordinatorOptions = (
  config: AppConfig,
): StateCoordinatorOptions => ({
  rateLimit: {
    windowMs: config.rateLimitWindowSeconds * 1000,
    maxRequests: config.rateLimitMessages,
  },
  context: {
    maxTurns: config.contextMaxTurns,
    maxIdentities: config.contextMaxIdentities,
  },
})

export const getBotInfo = (config: AppConfig) => ({
  bot_username: config.botUsername,
  admin_id: config.adminId,
  max_message_length: config.maxMessageLength,
  allowed_image_types: config.allowedImageTypes,
  rate_limit: {
    messages: config.rateLimitMessages,
    window_seconds: config.rateLimitWindowSeconds,
  },
  context_max_turns: config.contextMaxTurns,
})
