import type { Turn } from "~/lib/runtime-state"

export interface Sender {
  id: string
  username?: string
  firstName?: string
}

interface EventBase {
  chatId: string
  messageId: string
  from: Sender
}

export interface CommandEvent extends EventBase {
  kind: "command"
  command: string
  args: Array<string>
}

export interface TextEvent extends EventBase {
  kind: "text"
  text: string
}

export interface PhotoEvent extends EventBase {
  kind: "photo"
  fileId: string
  fileSize?: number
  mimeType?: string
  caption?: string
}

export interface CallbackEvent extends EventBase {
  kind: "callback"
  callbackId: string
  data: string
}

export type InboundEvent = CommandEvent | TextEvent | PhotoEvent | CallbackEvent

export interface InlineButton {
  text: string
  data: string
}

export type InlineKeyboard = Array<Array<InlineButton>>

export type ChatAction = "typing" | "upload_photo"

export interface OutgoingImage {
  data: Uint8Array
  mimeType: string
}

export interface SendOptions {
  keyboard?: InlineKeyboard
}

/** What the processing loop needs from the chat platform. */
export interface ChatPlatform {
  receive(signal?: AbortSignal): Promise<Array<InboundEvent>>
  sendText(chatId: string, text: string, options?: SendOptions): Promise<string>
  editText(
    chatId: string,
    messageId: string,
    text: string,
    options?: SendOptions,
  ): Promise<void>
  deleteMessage(chatId: string, messageId: string): Promise<void>
  sendChatAction(chatId: string, action: ChatAction): Promise<void>
  sendPhoto(chatId: string, image: OutgoingImage, caption: string): Promise<void>
  downloadFile(fileId: string, signal?: AbortSignal): Promise<Uint8Array>
  answerCallback(callbackId: string): Promise<void>
}

export interface GeneratedImage {
  image: OutgoingImage
  description: string
}

/** What the processing loop needs from the generative-AI provider. */
export interface AssistantBackend {
  chat(context: ReadonlyArray<Turn>, signal?: AbortSignal): Promise<string>
  analyzeImage(
    image: OutgoingImage,
    prompt: string,
    signal?: AbortSignal,
  ): Promise<string>
  generateImage(prompt: string, signal?: AbortSignal): Promise<GeneratedImage>
}
