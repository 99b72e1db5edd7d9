import type {
  AssistantBackend,
  GeneratedImage,
  OutgoingImage,
} from "~/bot/types"
import type { Turn } from "~/lib/runtime-state"

import { GEMINI_MODELS, type GeminiModels } from "~/lib/api-config"
import { BackendError } from "~/lib/error"
import { createHandlerLogger } from "~/lib/logger"

import {
  generateContent,
  responseText,
  type Content,
} from "./generate-content"

const logger = createHandlerLogger("gemini")

// Only the tail of the stored conversation is sent with each request
export const CHAT_HISTORY_TURNS = 10

const DEFAULT_ANALYSIS_PROMPT =
  "Analyze this image in detail. Describe what you see, including objects, "
  + "people, activities, colors, composition, and any notable aspects. "
  + "Provide a comprehensive analysis."

export const toGeminiContents = (
  context: ReadonlyArray<Turn>,
): Array<Content> =>
  context.slice(-CHAT_HISTORY_TURNS).map((turn): Content => ({
    role: turn.role === "user" ? "user" : "model",
    parts: [{ text: turn.text }],
  }))

export class GeminiBackend implements AssistantBackend {
  constructor(
    private readonly apiKey: string,
    private readonly models: GeminiModels = GEMINI_MODELS,
  ) {}

  async chat(
    context: ReadonlyArray<Turn>,
    signal?: AbortSignal,
  ): Promise<string> {
    const contents = toGeminiContents(context)
    logger.debug(`Sending ${contents.length} turns to ${this.models.text}`)

    const response = await generateContent(
      this.apiKey,
      this.models.text,
      { contents },
      signal,
    )
    return responseText(response) || "Sorry, I couldn't generate a response."
  }

  async analyzeImage(
    image: OutgoingImage,
    prompt: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const response = await generateContent(
      this.apiKey,
      this.models.vision,
      {
        contents: [
          {
            role: "user",
            parts: [
              {
                inlineData: {
                  mimeType: image.mimeType,
                  data: Buffer.from(image.data).toString("base64"),
                },
              },
              { text: prompt || DEFAULT_ANALYSIS_PROMPT },
            ],
          },
        ],
      },
      signal,
    )
    return responseText(response) || "Sorry, I couldn't analyze this image."
  }

  async generateImage(
    prompt: string,
    signal?: AbortSignal,
  ): Promise<GeneratedImage> {
    const response = await generateContent(
      this.apiKey,
      this.models.imageGeneration,
      {
        contents: [
          { role: "user", parts: [{ text: `Generate an image: ${prompt}` }] },
        ],
        generationConfig: { responseModalities: ["TEXT", "IMAGE"] },
      },
      signal,
    )

    const parts = response.candidates?.[0]?.content?.parts
    if (!parts || parts.length === 0) {
      throw new BackendError("No image content received")
    }

    let description = ""
    let image: OutgoingImage | undefined
    for (const part of parts) {
      if (part.text) {
        description += part.text
      } else if (part.inlineData?.data) {
        image = {
          data: Buffer.from(part.inlineData.data, "base64"),
          mimeType: part.inlineData.mimeType,
        }
      }
    }

    if (!image) {
      throw new BackendError("No image data received")
    }

    return { image, description: description || "Image generated successfully" }
  }
}
