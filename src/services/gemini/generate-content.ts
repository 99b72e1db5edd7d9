import { GEMINI_BASE_URL, geminiHeaders } from "~/lib/api-config"
import { HTTPError } from "~/lib/error"

export const generateContent = async (
  apiKey: string,
  model: string,
  payload: GenerateContentPayload,
  signal?: AbortSignal,
) => {
  const response = await fetch(
    `${GEMINI_BASE_URL}/models/${model}:generateContent`,
    {
      method: "POST",
      headers: geminiHeaders(apiKey),
      body: JSON.stringify(payload),
      signal,
    },
  )

  if (!response.ok) throw new HTTPError("Failed to generate content", response)

  return (await response.json()) as GenerateContentResponse
}

/** Concatenated text of the first candidate, or "" when there is none. */
export const responseText = (response: GenerateContentResponse): string =>
  (response.candidates?.[0]?.content?.parts ?? [])
    .map((part) => part.text ?? "")
    .join("")

// Payload types

export type ContentRole = "user" | "model"

export interface TextPart {
  text: string
}

export interface InlineDataPart {
  inlineData: {
    mimeType: string
    data: string
  }
}

export type ContentPart = TextPart | InlineDataPart

export interface Content {
  role?: ContentRole
  parts: Array<ContentPart>
}

export interface GenerateContentPayload {
  contents: Array<Content>
  generationConfig?: {
    responseModalities?: Array<"TEXT" | "IMAGE">
    temperature?: number
    maxOutputTokens?: number
  }
}

// Response types

export interface ResponsePart {
  text?: string
  inlineData?: {
    mimeType: string
    data: string
  }
}

export interface Candidate {
  content?: {
    role?: string
    parts?: Array<ResponsePart>
  }
  finishReason?: string
}

export interface GenerateContentResponse {
  candidates?: Array<Candidate>
  promptFeedback?: {
    blockReason?: string
  }
  usageMetadata?: {
    promptTokenCount?: number
    candidatesTokenCount?: number
    totalTokenCount?: number
  }
}
