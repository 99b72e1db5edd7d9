export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta"

export interface GeminiModels {
  text: string
  vision: string
  imageGeneration: string
}

export const GEMINI_MODELS: GeminiModels = {
  text: "gemini-2.5-flash",
  vision: "gemini-2.5-pro",
  imageGeneration: "gemini-2.0-flash-preview-image-generation",
}

export const geminiHeaders = (apiKey: string): Record<string, string> => ({
  "content-type": "application/json",
  accept: "application/json",
  "x-goog-api-key": apiKey,
})

export const TELEGRAM_BASE_URL = "https://api.telegram.org"

export const telegramMethodUrl = (token: string, method: string) =>
  `${TELEGRAM_BASE_URL}/bot${token}/${method}`

export const telegramFileUrl = (token: string, filePath: string) =>
  `${TELEGRAM_BASE_URL}/file/bot${token}/${filePath}`
