import { afterEach, describe, expect, test, vi } from "vitest"

import type { Update } from "~/services/telegram/types"

import { HTTPError } from "~/lib/error"
import { TelegramPlatform, toInboundEvent } from "~/services/telegram/platform"

const TOKEN = "test-telegram-token"

const chat = { id: 42, type: "private" }
const from = { id: 42, is_bot: false, first_name: "Ada", username: "ada" }

const messageUpdate = (
  updateId: number,
  message: Partial<NonNullable<Update["message"]>>,
): Update => ({
  update_id: updateId,
  message: { message_id: 7, date: 0, chat, from, ...message },
})

const okResponse = (result: unknown) =>
  new Response(JSON.stringify({ ok: true, result }), {
    headers: { "content-type": "application/json" },
  })

const stubFetch = (respond: (url: string, init?: RequestInit) => Response) => {
  const fetchMock = vi.fn((input: string | URL | Request, init?: RequestInit) =>
    Promise.resolve(respond(String(input), init)),
  )
  vi.stubGlobal("fetch", fetchMock)
  return fetchMock
}

const jsonBody = (init: RequestInit | undefined): unknown =>
  typeof init?.body === "string" ? JSON.parse(init.body) : undefined

afterEach(() => {
  vi.unstubAllGlobals()
})

describe("toInboundEvent", () => {
  test("plain text becomes a text event", () => {
    expect(toInboundEvent(messageUpdate(1, { text: "hello there" }))).toEqual({
      kind: "text",
      chatId: "42",
      messageId: "7",
      from: { id: "42", username: "ada", firstName: "Ada" },
      text: "hello there",
    })
  })

  test("commands are lowercased and lose the bot suffix", () => {
    const event = toInboundEvent(
      messageUpdate(1, { text: "/Generate@TestBot a red  fox" }),
    )

    expect(event).toMatchObject({
      kind: "command",
      command: "generate",
      args: ["a", "red", "fox"],
    })
  })

  test("photos use the largest size", () => {
    const event = toInboundEvent(
      messageUpdate(1, {
        caption: "look",
        photo: [
          { file_id: "small", file_unique_id: "s", width: 90, height: 90 },
          {
            file_id: "large",
            file_unique_id: "l",
            width: 1280,
            height: 1280,
            file_size: 2048,
          },
        ],
      }),
    )

    expect(event).toMatchObject({
      kind: "photo",
      fileId: "large",
      fileSize: 2048,
      mimeType: "image/jpeg",
      caption: "look",
    })
  })

  test("callback queries keep the originating message", () => {
    const event = toInboundEvent({
      update_id: 3,
      callback_query: {
        id: "cb-9",
        from,
        data: "admin_stats",
        message: { message_id: 11, date: 0, chat },
      },
    })

    expect(event).toEqual({
      kind: "callback",
      chatId: "42",
      messageId: "11",
      from: { id: "42", username: "ada", firstName: "Ada" },
      callbackId: "cb-9",
      data: "admin_stats",
    })
  })

  test("updates without text or photo are skipped", () => {
    expect(toInboundEvent(messageUpdate(1, {}))).toBeUndefined()
    expect(toInboundEvent({ update_id: 2 })).toBeUndefined()
  })
})

describe("TelegramPlatform", () => {
  test("receive advances the offset past every update", async () => {
    const bodies: Array<unknown> = []
    let call = 0
    stubFetch((_url, init) => {
      bodies.push(jsonBody(init))
      call += 1
      return call === 1 ?
          okResponse([
            messageUpdate(5, { text: "one" }),
            messageUpdate(6, {}),
          ])
        : okResponse([])
    })
    const platform = new TelegramPlatform(TOKEN)

    const first = await platform.receive()
    await platform.receive()

    expect(first).toHaveLength(1)
    expect(bodies[0]).toMatchObject({ offset: 0, timeout: 30 })
    expect(bodies[1]).toMatchObject({ offset: 7 })
  })

  test("sendText returns the new message id and maps the keyboard", async () => {
    const fetchMock = stubFetch(() =>
      okResponse({ message_id: 99, date: 0, chat }),
    )
    const platform = new TelegramPlatform(TOKEN)

    const id = await platform.sendText("42", "hi", {
      keyboard: [[{ text: "Close", data: "admin_close" }]],
    })

    expect(id).toBe("99")
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe(`https://api.telegram.org/bot${TOKEN}/sendMessage`)
    expect(jsonBody(init)).toEqual({
      chat_id: "42",
      text: "hi",
      reply_markup: {
        inline_keyboard: [[{ text: "Close", callback_data: "admin_close" }]],
      },
    })
  })

  test("an ok=false payload is raised as an error", async () => {
    stubFetch(
      () =>
        new Response(
          JSON.stringify({ ok: false, description: "Bad Request: chat not found" }),
        ),
    )
    const platform = new TelegramPlatform(TOKEN)

    await expect(platform.sendText("42", "hi")).rejects.toThrow(
      "Telegram sendMessage failed: Bad Request: chat not found",
    )
  })

  test("a non-2xx response is raised as an HTTPError", async () => {
    stubFetch(() => new Response("unauthorized", { status: 401 }))
    const platform = new TelegramPlatform(TOKEN)

    await expect(platform.receive()).rejects.toBeInstanceOf(HTTPError)
  })

  test("downloadFile resolves the path then fetches the bytes", async () => {
    const fetchMock = stubFetch((url) =>
      url.includes("/getFile") ?
        okResponse({ file_id: "f1", file_path: "photos/f1.jpg" })
      : new Response(new Uint8Array([1, 2, 3])),
    )
    const platform = new TelegramPlatform(TOKEN)

    const data = await platform.downloadFile("f1")

    expect(Array.from(data)).toEqual([1, 2, 3])
    expect(fetchMock.mock.calls[1][0]).toBe(
      `https://api.telegram.org/file/bot${TOKEN}/photos/f1.jpg`,
    )
  })
})
