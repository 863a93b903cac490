export type ReceiveResult<T> = { ok: true; value: T } | { ok: false }

/**
 * Receiving side of a channel, as consumed by the select loops.
 */
export interface ReceiveChannel<T> {
  /** Takes the oldest buffered value without waiting. */
  tryReceive(): ReceiveResult<T>

  /**
   * Resolves once a value is buffered, the channel gets closed, or `signal`
   * aborts. A channel that is already closed and empty only resolves on abort.
   */
  ready(signal: AbortSignal): Promise<void>

  /** `true` when the channel is closed and nothing is left to receive. */
  readonly drained: boolean
}

export interface SendChannel<T> {
  /** Buffers a value. Throws once the channel is closed. */
  send(value: T): void

  /** Closes the channel; buffered values stay receivable. Idempotent. */
  close(): void
}
