import type { StateCoordinator } from "~/lib/runtime-state"

import { InvariantViolation, errorMessage, isAbortError } from "~/lib/error"
import { createHandlerLogger } from "~/lib/logger"

import type { UpdateHandler } from "./handler"
import type { ChatPlatform, InboundEvent } from "./types"

const logger = createHandlerLogger("loop")

const RECEIVE_RETRY_MS = 5_000
const SWEEP_INTERVAL_MS = 10 * 60_000

export interface ProcessingLoopOptions {
  platform: ChatPlatform
  handler: UpdateHandler
  coordinator: StateCoordinator
  receiveRetryMs?: number
  sweepIntervalMs?: number
}

const sleep = (ms: number, signal: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve()
      return
    }
    const timer = setTimeout(done, ms)
    function done() {
      clearTimeout(timer)
      signal.removeEventListener("abort", done)
      resolve()
    }
    signal.addEventListener("abort", done, { once: true })
  })

/**
 * Receives platform events and handles them strictly one at a time. The loop
 * only suspends while waiting on the platform or the AI backend.
 */
export class ProcessingLoop {
  private readonly platform: ChatPlatform
  private readonly handler: UpdateHandler
  private readonly coordinator: StateCoordinator
  private readonly receiveRetryMs: number
  private readonly sweepIntervalMs: number

  private controller: AbortController | undefined
  private running: Promise<void> | undefined

  constructor(options: ProcessingLoopOptions) {
    this.platform = options.platform
    this.handler = options.handler
    this.coordinator = options.coordinator
    this.receiveRetryMs = options.receiveRetryMs ?? RECEIVE_RETRY_MS
    this.sweepIntervalMs = options.sweepIntervalMs ?? SWEEP_INTERVAL_MS
  }

  get isRunning(): boolean {
    return this.running !== undefined
  }

  start(): Promise<void> {
    if (this.running) return this.running

    const controller = new AbortController()
    this.controller = controller
    this.running = this.run(controller.signal).finally(() => {
      this.running = undefined
      this.controller = undefined
    })
    return this.running
  }

  async stop(): Promise<void> {
    this.controller?.abort()
    await this.running
  }

  /**
   * Handles one event. Failures are logged and counted; only invariant
   * violations escape, and they stop the loop.
   */
  async dispatch(event: InboundEvent): Promise<void> {
    try {
      await this.handler.handle(event)
    } catch (error) {
      if (error instanceof InvariantViolation) throw error
      logger.error(`Failed to handle ${event.kind} event:`, error)
      await this.coordinator.recordError()
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    logger.info("Processing loop started")
    let lastSweep = Date.now()

    while (!signal.aborted) {
      let events: Array<InboundEvent>
      try {
        events = await this.platform.receive(signal)
      } catch (error) {
        if (signal.aborted && isAbortError(error)) break
        logger.warn(
          `Failed to receive updates, retrying in ${this.receiveRetryMs}ms:`,
          errorMessage(error),
        )
        await sleep(this.receiveRetryMs, signal)
        continue
      }

      for (const event of events) {
        await this.dispatch(event)
      }

      if (Date.now() - lastSweep >= this.sweepIntervalMs) {
        lastSweep = Date.now()
        const removed = await this.coordinator.sweepIdle()
        if (removed > 0) logger.debug(`Forgot ${removed} idle rate windows`)
      }
    }

    logger.info("Processing loop stopped")
  }
}
