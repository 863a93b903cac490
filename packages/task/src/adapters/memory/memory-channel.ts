import { BaseError } from "@snapcfg/errors"
import type { ReceiveChannel, ReceiveResult, SendChannel } from "../../ports/channel"

type Entry<T> = { value: T }

export class ChannelClosedError extends BaseError<"channel_closed"> {
  constructor() {
    super("Send on closed channel", { code: "channel_closed", isOperational: false })
  }
}

/**
 * Unbounded in-process FIFO channel.
 */
export class MemoryChannel<T> implements ReceiveChannel<T>, SendChannel<T> {
  private readonly buffer: Entry<T>[] = []
  private readonly waiters = new Set<() => void>()
  private isClosed = false

  get size(): number {
    return this.buffer.length
  }

  get closed(): boolean {
    return this.isClosed
  }

  get drained(): boolean {
    return this.isClosed && this.buffer.length === 0
  }

  send(value: T): void {
    if (this.isClosed) throw new ChannelClosedError()

    this.buffer.push({ value })
    this.wake()
  }

  close(): void {
    if (this.isClosed) return

    this.isClosed = true
    this.wake()
  }

  tryReceive(): ReceiveResult<T> {
    const entry = this.buffer.shift()
    if (!entry) return { ok: false }

    return { ok: true, value: entry.value }
  }

  /**
   * Waits for the next value. Resolves `{ ok: false }` when the channel is
   * drained or `signal` aborts first.
   */
  async receive(signal?: AbortSignal): Promise<ReceiveResult<T>> {
    for (;;) {
      const result = this.tryReceive()
      if (result.ok || this.isClosed || signal?.aborted) return result

      await this.waitForChange(signal)
    }
  }

  ready(signal: AbortSignal): Promise<void> {
    if (this.buffer.length > 0 || signal.aborted) return Promise.resolve()
    if (this.isClosed) return untilAborted(signal)

    return this.waitForChange(signal)
  }

  private waitForChange(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiters.delete(wake)
        resolve()
      }

      const wake = () => {
        signal?.removeEventListener("abort", onAbort)
        resolve()
      }

      this.waiters.add(wake)
      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }

  private wake(): void {
    const waiters = [...this.waiters]
    this.waiters.clear()

    for (const wake of waiters) wake()
  }
}

export function createChannel<T>(): MemoryChannel<T> {
  return new MemoryChannel<T>()
}

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true })
  })
}
