import type { AppConfig } from "~/lib/config"
import type { StateCoordinator } from "~/lib/runtime-state"

import { errorMessage, isAbortError } from "~/lib/error"
import { formatMessage } from "~/lib/format"
import { createHandlerLogger } from "~/lib/logger"

import type {
  AssistantBackend,
  CallbackEvent,
  ChatAction,
  ChatPlatform,
  CommandEvent,
  InboundEvent,
  PhotoEvent,
  TextEvent,
} from "./types"

import {
  ADMIN_ACTIONS,
  ADMIN_PANEL_KEYBOARD,
  ADMIN_PANEL_TEXT,
  BACK_KEYBOARD,
  isAdmin,
  isAdminAction,
} from "./admin"
import {
  ACCESS_DENIED_TEXT,
  ADMIN_PANEL_CLOSED_TEXT,
  ANALYZING_TEXT,
  CONTEXT_CLEARED_TEXT,
  GENERATE_USAGE_TEXT,
  GENERATING_TEXT,
  GENERIC_FAILURE_TEXT,
  RATE_LIMITED_TEXT,
  detailedStatsText,
  helpText,
  imageTooLargeText,
  settingsText,
  statusText,
  systemInfoText,
  userInfoText,
  welcomeText,
} from "./messages"

const logger = createHandlerLogger("handler")

export interface UpdateHandlerDeps {
  coordinator: StateCoordinator
  platform: ChatPlatform
  backend: AssistantBackend
  config: AppConfig
}

/**
 * Turns one inbound event into coordinator calls and platform replies.
 * Failures of the AI backend (or of the platform while serving a backend
 * request) are recorded once as an error and answered with a generic message;
 * the user turn that started the request stays in the conversation.
 */
export class UpdateHandler {
  private readonly coordinator: StateCoordinator
  private readonly platform: ChatPlatform
  private readonly backend: AssistantBackend
  private readonly config: AppConfig

  constructor(deps: UpdateHandlerDeps) {
    this.coordinator = deps.coordinator
    this.platform = deps.platform
    this.backend = deps.backend
    this.config = deps.config
  }

  async handle(event: InboundEvent): Promise<void> {
    logger.info(
      `User ${event.from.id} (@${event.from.username ?? "unknown"}) - ${describe(event)}`,
    )

    switch (event.kind) {
      case "command":
        return this.handleCommand(event)
      case "text":
        return this.handleText(event)
      case "photo":
        return this.handlePhoto(event)
      case "callback":
        return this.handleCallback(event)
    }
  }

  private async handleCommand(event: CommandEvent): Promise<void> {
    const { chatId, from } = event

    switch (event.command) {
      case "start":
        await this.platform.sendText(
          chatId,
          welcomeText(from.firstName ?? "there", this.isAdmin(event)),
        )
        return
      case "help":
        await this.platform.sendText(chatId, helpText(this.config))
        return
      case "generate":
        return this.handleGenerate(event)
      case "status":
        await this.platform.sendText(
          chatId,
          statusText(await this.coordinator.statusSnapshot()),
        )
        return
      case "clear":
        await this.coordinator.resetConversation(from.id)
        await this.platform.sendText(chatId, CONTEXT_CLEARED_TEXT)
        return
      case "admin":
        if (!this.isAdmin(event)) {
          await this.platform.sendText(chatId, ACCESS_DENIED_TEXT)
          return
        }
        await this.platform.sendText(chatId, ADMIN_PANEL_TEXT, {
          keyboard: ADMIN_PANEL_KEYBOARD,
        })
        return
      case "stats":
        if (!this.isAdmin(event)) {
          await this.platform.sendText(chatId, ACCESS_DENIED_TEXT)
          return
        }
        await this.platform.sendText(
          chatId,
          detailedStatsText(await this.coordinator.statusSnapshot()),
          { keyboard: BACK_KEYBOARD },
        )
        return
      default:
        await this.platform.sendText(
          chatId,
          "❓ Unknown command. Send /help to see what I can do.",
        )
    }
  }

  private async handleText(event: TextEvent): Promise<void> {
    const { chatId, from } = event

    const admission = await this.coordinator.tryHandleMessage(
      from.id,
      event.text,
    )
    if (admission.status === "rate_limited") {
      logger.debug(
        `Rate limited ${from.id}, retry in ${admission.retryAfterMs}ms`,
      )
      await this.platform.sendText(chatId, RATE_LIMITED_TEXT)
      return
    }

    await this.sendAction(chatId, "typing")

    try {
      const reply = await this.backend.chat(
        admission.context,
        AbortSignal.timeout(this.config.backendTimeoutMs),
      )
      await this.coordinator.recordAssistantTurn(from.id, reply)
      await this.platform.sendText(
        chatId,
        formatMessage(reply, this.config.maxMessageLength),
      )
    } catch (error) {
      await this.recordFailure("chat", error)
      await this.notifyFailure(() =>
        this.platform.sendText(chatId, GENERIC_FAILURE_TEXT),
      )
    }
  }

  private async handlePhoto(event: PhotoEvent): Promise<void> {
    const { chatId, from } = event

    const admission = await this.coordinator.tryAdmit(from.id)
    if (admission.status === "rate_limited") {
      await this.platform.sendText(chatId, RATE_LIMITED_TEXT)
      return
    }

    await this.sendAction(chatId, "typing")
    const statusMessageId = await this.platform.sendText(chatId, ANALYZING_TEXT)

    if (
      event.fileSize !== undefined
      && event.fileSize > this.config.maxImageSize
    ) {
      await this.platform.editText(
        chatId,
        statusMessageId,
        imageTooLargeText(this.config.maxImageSize),
      )
      return
    }

    const mimeType = event.mimeType ?? "image/jpeg"
    if (!this.config.allowedImageTypes.includes(mimeType.toLowerCase())) {
      await this.platform.editText(
        chatId,
        statusMessageId,
        "❌ Unsupported image format. Please send JPEG, PNG, or WebP.",
      )
      return
    }

    try {
      const signal = AbortSignal.timeout(this.config.backendTimeoutMs)
      const data = await this.platform.downloadFile(event.fileId, signal)

      const caption = event.caption?.trim() ?? ""
      const prompt =
        caption ? `User caption: ${caption}\n\nPlease analyze this image.` : ""
      const analysis = await this.backend.analyzeImage(
        { data, mimeType },
        prompt,
        signal,
      )

      let text = `🔍 Image Analysis\n\n${analysis}`
      if (caption) {
        text = `📝 Your caption: ${caption}\n\n${text}`
      }
      await this.platform.editText(
        chatId,
        statusMessageId,
        formatMessage(text, this.config.maxMessageLength),
      )
      await this.coordinator.recordImageEvent("analyzed")
    } catch (error) {
      await this.recordFailure("image analysis", error)
      await this.notifyFailure(() =>
        this.platform.editText(chatId, statusMessageId, GENERIC_FAILURE_TEXT),
      )
    }
  }

  private async handleGenerate(event: CommandEvent): Promise<void> {
    const { chatId, from } = event

    const admission = await this.coordinator.tryAdmit(from.id)
    if (admission.status === "rate_limited") {
      await this.platform.sendText(chatId, RATE_LIMITED_TEXT)
      return
    }

    const prompt = event.args.join(" ").trim()
    if (!prompt) {
      await this.platform.sendText(chatId, GENERATE_USAGE_TEXT)
      return
    }

    await this.sendAction(chatId, "upload_photo")
    const statusMessageId = await this.platform.sendText(
      chatId,
      GENERATING_TEXT,
    )

    try {
      const { image, description } = await this.backend.generateImage(
        prompt,
        AbortSignal.timeout(this.config.backendTimeoutMs),
      )
      await this.platform.sendPhoto(
        chatId,
        image,
        `🎨 Generated Image\n\nPrompt: ${prompt}\n\n${description}`,
      )
      await this.coordinator.recordImageEvent("generated")
    } catch (error) {
      await this.recordFailure("image generation", error)
      await this.notifyFailure(() =>
        this.platform.editText(chatId, statusMessageId, GENERIC_FAILURE_TEXT),
      )
      return
    }

    try {
      await this.platform.deleteMessage(chatId, statusMessageId)
    } catch (error) {
      logger.warn("Failed to delete progress message:", errorMessage(error))
    }
  }

  private async handleCallback(event: CallbackEvent): Promise<void> {
    const { chatId, messageId } = event
    await this.platform.answerCallback(event.callbackId)

    if (!this.isAdmin(event)) {
      await this.platform.editText(chatId, messageId, ACCESS_DENIED_TEXT)
      return
    }

    if (!isAdminAction(event.data)) {
      logger.debug(`Ignoring unknown callback data "${event.data}"`)
      return
    }

    const back = { keyboard: BACK_KEYBOARD }
    switch (event.data) {
      case ADMIN_ACTIONS.back:
        await this.platform.editText(chatId, messageId, ADMIN_PANEL_TEXT, {
          keyboard: ADMIN_PANEL_KEYBOARD,
        })
        return
      case ADMIN_ACTIONS.stats: {
        const snapshot = await this.coordinator.statusSnapshot()
        await this.platform.editText(
          chatId,
          messageId,
          detailedStatsText(snapshot),
          back,
        )
        return
      }
      case ADMIN_ACTIONS.users: {
        const snapshot = await this.coordinator.statusSnapshot()
        const sizes = await this.coordinator.conversationSizes(10)
        await this.platform.editText(
          chatId,
          messageId,
          userInfoText(snapshot.active_users, sizes),
          back,
        )
        return
      }
      case ADMIN_ACTIONS.settings:
        await this.platform.editText(
          chatId,
          messageId,
          settingsText(this.config),
          back,
        )
        return
      case ADMIN_ACTIONS.system:
        await this.platform.editText(chatId, messageId, systemInfoText(), back)
        return
      case ADMIN_ACTIONS.close:
        await this.platform.editText(chatId, messageId, ADMIN_PANEL_CLOSED_TEXT)
        return
    }
  }

  private isAdmin(event: InboundEvent): boolean {
    return isAdmin(event.from.id, this.config.adminId)
  }

  private async sendAction(chatId: string, action: ChatAction): Promise<void> {
    try {
      await this.platform.sendChatAction(chatId, action)
    } catch (error) {
      logger.warn(`Failed to send ${action} action:`, errorMessage(error))
    }
  }

  private async recordFailure(operation: string, error: unknown): Promise<void> {
    if (isAbortError(error)) {
      logger.error(
        `${operation} timed out after ${this.config.backendTimeoutMs}ms`,
      )
    } else {
      logger.error(`Error in ${operation}:`, error)
    }
    await this.coordinator.recordError()
  }

  // The failure is already counted; a second one from the platform is only logged
  private async notifyFailure(send: () => Promise<unknown>): Promise<void> {
    try {
      await send()
    } catch (error) {
      logger.warn("Failed to deliver failure notice:", errorMessage(error))
    }
  }
}

const describe = (event: InboundEvent): string => {
  switch (event.kind) {
    case "command":
      return `/${event.command}`
    case "text":
      return `message (${event.text.length} chars)`
    case "photo":
      return "photo"
    case "callback":
      return `callback ${event.data}`
  }
}
