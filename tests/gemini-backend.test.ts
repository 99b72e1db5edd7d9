import { afterEach, describe, expect, test, vi } from "vitest"

import type { Turn } from "~/lib/runtime-state"
import type { GenerateContentResponse } from "~/services/gemini/generate-content"

import { BackendError, HTTPError } from "~/lib/error"
import {
  CHAT_HISTORY_TURNS,
  GeminiBackend,
  toGeminiContents,
} from "~/services/gemini/backend"

const API_KEY = "test-gemini-key"

const stubFetch = (response: () => Response) => {
  const fetchMock = vi.fn((_input: string | URL | Request, _init?: RequestInit) =>
    Promise.resolve(response()),
  )
  vi.stubGlobal("fetch", fetchMock)
  return fetchMock
}

const reply = (body: GenerateContentResponse) => () =>
  new Response(JSON.stringify(body), {
    headers: { "content-type": "application/json" },
  })

const turns = (count: number): Array<Turn> =>
  Array.from({ length: count }, (_, index): Turn => ({
    role: index % 2 === 0 ? "user" : "assistant",
    text: `turn ${index}`,
    timestamp: index,
  }))

afterEach(() => {
  vi.unstubAllGlobals()
})

describe("toGeminiContents", () => {
  test("keeps only the most recent turns and maps roles", () => {
    const contents = toGeminiContents(turns(14))

    expect(contents).toHaveLength(CHAT_HISTORY_TURNS)
    expect(contents[0]).toEqual({ role: "user", parts: [{ text: "turn 4" }] })
    expect(contents[1]).toEqual({ role: "model", parts: [{ text: "turn 5" }] })
  })
})

describe("GeminiBackend", () => {
  test("chat posts the conversation and joins the reply parts", async () => {
    const fetchMock = stubFetch(
      reply({
        candidates: [{ content: { parts: [{ text: "Hello" }, { text: "!" }] } }],
      }),
    )
    const backend = new GeminiBackend(API_KEY)

    const text = await backend.chat(turns(1))

    expect(text).toBe("Hello!")
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe(
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent",
    )
    expect(init?.headers).toMatchObject({ "x-goog-api-key": API_KEY })
  })

  test("chat falls back to a default reply when nothing comes back", async () => {
    stubFetch(reply({ candidates: [] }))
    const backend = new GeminiBackend(API_KEY)

    expect(await backend.chat(turns(1))).toBe(
      "Sorry, I couldn't generate a response.",
    )
  })

  test("non-2xx responses are raised as HTTPError", async () => {
    stubFetch(() => new Response("quota exceeded", { status: 429 }))
    const backend = new GeminiBackend(API_KEY)

    const failure = backend.chat(turns(1))

    await expect(failure).rejects.toBeInstanceOf(HTTPError)
    await expect(failure).rejects.toThrow("Failed to generate content")
  })

  test("analyzeImage sends the image inline", async () => {
    const fetchMock = stubFetch(
      reply({ candidates: [{ content: { parts: [{ text: "a cat" }] } }] }),
    )
    const backend = new GeminiBackend(API_KEY)

    const analysis = await backend.analyzeImage(
      { data: new Uint8Array([104, 105]), mimeType: "image/png" },
      "what is this?",
    )

    expect(analysis).toBe("a cat")
    const init = fetchMock.mock.calls[0][1]
    const body: unknown =
      typeof init?.body === "string" ? JSON.parse(init.body) : undefined
    expect(body).toEqual({
      contents: [
        {
          role: "user",
          parts: [
            { inlineData: { mimeType: "image/png", data: "aGk=" } },
            { text: "what is this?" },
          ],
        },
      ],
    })
  })

  test("generateImage decodes the returned image", async () => {
    stubFetch(
      reply({
        candidates: [
          {
            content: {
              parts: [
                { text: "A fox." },
                { inlineData: { mimeType: "image/png", data: "AQID" } },
              ],
            },
          },
        ],
      }),
    )
    const backend = new GeminiBackend(API_KEY)

    const { image, description } = await backend.generateImage("fox")

    expect(description).toBe("A fox.")
    expect(image.mimeType).toBe("image/png")
    expect(Array.from(image.data)).toEqual([1, 2, 3])
  })

  test("generateImage without image data is a BackendError", async () => {
    stubFetch(
      reply({ candidates: [{ content: { parts: [{ text: "I can't" }] } }] }),
    )
    const backend = new GeminiBackend(API_KEY)

    await expect(backend.generateImage("fox")).rejects.toBeInstanceOf(
      BackendError,
    )
  })
})
