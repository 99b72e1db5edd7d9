import type {
  ChatAction,
  ChatPlatform,
  InboundEvent,
  InlineKeyboard,
  OutgoingImage,
  SendOptions,
} from "~/bot/types"

import { telegramFileUrl } from "~/lib/api-config"
import { HTTPError } from "~/lib/error"
import { truncateText } from "~/lib/format"
import { createHandlerLogger } from "~/lib/logger"

import type {
  InlineKeyboardMarkup,
  TelegramFile,
  TelegramMessage,
  Update,
} from "./types"

import { callBotApi } from "./call-bot-api"

const logger = createHandlerLogger("telegram")

const POLL_TIMEOUT_SECONDS = 30
const MAX_CAPTION_LENGTH = 1024

const toReplyMarkup = (
  keyboard: InlineKeyboard | undefined,
): InlineKeyboardMarkup | undefined =>
  keyboard && {
    inline_keyboard: keyboard.map((row) =>
      row.map((button) => ({ text: button.text, callback_data: button.data })),
    ),
  }

const parseCommand = (
  text: string,
): { command: string; args: Array<string> } | undefined => {
  if (!text.startsWith("/")) return undefined

  const [head, ...args] = text.trim().split(/\s+/)
  // "/start@SomeBot" addresses a specific bot in group chats
  const command = head.slice(1).split("@")[0].toLowerCase()
  if (!command) return undefined

  return { command, args }
}

const senderOf = (message: TelegramMessage) => ({
  id: String(message.from?.id ?? message.chat.id),
  username: message.from?.username,
  firstName: message.from?.first_name,
})

/** Maps a Bot API update to the loop's event model; unsupported updates yield undefined. */
export function toInboundEvent(update: Update): InboundEvent | undefined {
  const query = update.callback_query
  if (query) {
    if (!query.message || !query.data) return undefined
    return {
      kind: "callback",
      chatId: String(query.message.chat.id),
      messageId: String(query.message.message_id),
      from: {
        id: String(query.from.id),
        username: query.from.username,
        firstName: query.from.first_name,
      },
      callbackId: query.id,
      data: query.data,
    }
  }

  const message = update.message
  if (!message) return undefined

  const base = {
    chatId: String(message.chat.id),
    messageId: String(message.message_id),
    from: senderOf(message),
  }

  if (message.photo && message.photo.length > 0) {
    const largest = message.photo[message.photo.length - 1]
    return {
      ...base,
      kind: "photo",
      fileId: largest.file_id,
      fileSize: largest.file_size,
      mimeType: "image/jpeg",
      caption: message.caption,
    }
  }

  if (message.text === undefined) return undefined

  const parsed = parseCommand(message.text)
  if (parsed) {
    return { ...base, kind: "command", ...parsed }
  }

  return { ...base, kind: "text", text: message.text }
}

export class TelegramPlatform implements ChatPlatform {
  private offset = 0

  constructor(private readonly token: string) {}

  /** Discards updates that queued up while the bot was offline. */
  async dropPendingUpdates(): Promise<void> {
    await callBotApi<boolean>(this.token, "deleteWebhook", {
      drop_pending_updates: true,
    })
  }

  async receive(signal?: AbortSignal): Promise<Array<InboundEvent>> {
    const updates = await callBotApi<Array<Update>>(
      this.token,
      "getUpdates",
      {
        offset: this.offset,
        timeout: POLL_TIMEOUT_SECONDS,
        allowed_updates: ["message", "callback_query"],
      },
      signal,
    )

    const events: Array<InboundEvent> = []
    for (const update of updates) {
      this.offset = Math.max(this.offset, update.update_id + 1)
      const event = toInboundEvent(update)
      if (event) {
        events.push(event)
      } else {
        logger.debug(`Skipping unsupported update ${update.update_id}`)
      }
    }
    return events
  }

  async sendText(
    chatId: string,
    text: string,
    options: SendOptions = {},
  ): Promise<string> {
    const message = await callBotApi<TelegramMessage>(
      this.token,
      "sendMessage",
      {
        chat_id: chatId,
        text,
        reply_markup: toReplyMarkup(options.keyboard),
      },
    )
    return String(message.message_id)
  }

  async editText(
    chatId: string,
    messageId: string,
    text: string,
    options: SendOptions = {},
  ): Promise<void> {
    await callBotApi<unknown>(this.token, "editMessageText", {
      chat_id: chatId,
      message_id: Number(messageId),
      text,
      reply_markup: toReplyMarkup(options.keyboard),
    })
  }

  async deleteMessage(chatId: string, messageId: string): Promise<void> {
    await callBotApi<boolean>(this.token, "deleteMessage", {
      chat_id: chatId,
      message_id: Number(messageId),
    })
  }

  async sendChatAction(chatId: string, action: ChatAction): Promise<void> {
    await callBotApi<boolean>(this.token, "sendChatAction", {
      chat_id: chatId,
      action,
    })
  }

  async sendPhoto(
    chatId: string,
    image: OutgoingImage,
    caption: string,
  ): Promise<void> {
    const form = new FormData()
    form.append("chat_id", chatId)
    form.append("caption", truncateText(caption, MAX_CAPTION_LENGTH))
    form.append("photo", new Blob([image.data], { type: image.mimeType }), "image")
    await callBotApi<TelegramMessage>(this.token, "sendPhoto", form)
  }

  async downloadFile(fileId: string, signal?: AbortSignal): Promise<Uint8Array> {
    const file = await callBotApi<TelegramFile>(
      this.token,
      "getFile",
      { file_id: fileId },
      signal,
    )
    if (!file.file_path) {
      throw new Error(`Telegram returned no path for file ${fileId}`)
    }

    const response = await fetch(telegramFileUrl(this.token, file.file_path), {
      signal,
    })
    if (!response.ok) throw new HTTPError("Failed to download file", response)

    return new Uint8Array(await response.arrayBuffer())
  }

  async answerCallback(callbackId: string): Promise<void> {
    await callBotApi<boolean>(this.token, "answerCallbackQuery", {
      callback_query_id: callbackId,
    })
  }
}
