import { coordinatorOptions, type AppConfig } from "~/lib/config"
import { StateCoordinator } from "~/lib/runtime-state"

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  telegramToken: "test-telegram-token",
  geminiApiKey: "test-gemini-key",
  adminId: "1000",
  statusPort: 5000,
  botUsername: "TestBot",
  maxMessageLength: 4096,
  maxImageSize: 20 * 1024 * 1024,
  allowedImageTypes: ["image/jpeg", "image/png", "image/webp"],
  rateLimitMessages: 10,
  rateLimitWindowSeconds: 60,
  contextMaxTurns: 20,
  contextMaxIdentities: 100,
  backendTimeoutMs: 5_000,
  logLevel: "info",
  ...overrides,
})

export const createTestCoordinator = (
  config: AppConfig = testConfig(),
  clock: () => number = () => 0,
) => new StateCoordinator({ ...coordinatorOptions(config), clock })
