import { telegramMethodUrl } from "~/lib/api-config"
import { HTTPError } from "~/lib/error"

import type { TelegramResponse } from "./types"

export const callBotApi = async <T>(
  token: string,
  method: string,
  body: Record<string, unknown> | FormData,
  signal?: AbortSignal,
): Promise<T> => {
  const isForm = body instanceof FormData
  const response = await fetch(telegramMethodUrl(token, method), {
    method: "POST",
    headers: isForm ? undefined : { "content-type": "application/json" },
    body: isForm ? body : JSON.stringify(body),
    signal,
  })

  if (!response.ok) throw new HTTPError(`Telegram ${method} failed`, response)

  const payload = (await response.json()) as TelegramResponse<T>
  if (!payload.ok || payload.result === undefined) {
    throw new Error(
      `Telegram ${method} failed: ${payload.description ?? "no result"}`,
    )
  }

  return payload.result
}
