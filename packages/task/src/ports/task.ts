import type { Clock, Milliseconds } from "@snapcfg/clock"

/** Body of a background task. Receives the task's own cancellation signal. */
export type TaskFn = (signal: AbortSignal) => void | Promise<void>

/** Consumer of one value taken from a channel. */
export type Handler<T> = (value: T, signal: AbortSignal) => void | Promise<void>

/**
 * Control surface of a running task.
 *
 * The task runs under a signal derived from the parent passed at spawn time:
 * aborting the parent cancels the task, cancelling the task never aborts the
 * parent.
 */
export interface TaskHandle {
  /**
   * Requests cancellation by aborting the task's signal. Idempotent and
   * non-blocking; the task stops once its function observes the signal.
   */
  cancel(): void

  /**
   * Resolves when the task has completed, or as soon as `signal` aborts,
   * whichever comes first. Never cancels the task and never rejects.
   */
  join(signal?: AbortSignal): Promise<void>

  /** `true` once the task function has returned or thrown. */
  readonly done: boolean

  /** The value thrown by the task function, if it threw. */
  readonly error: unknown
}

export type TaskOptions = {
  /** Parent signal; the task is cancelled when it aborts. */
  signal?: AbortSignal

  /** Time source for scheduled work. @default SystemClock */
  clock?: Clock
}

export type Ticker = {
  /** Period between calls. Must be positive. */
  intervalMs: Milliseconds
  fn: TaskFn
}

export type ChanOptions = TaskOptions & {
  /** Also call `ticker.fn` on a fixed period from the same loop. */
  ticker?: Ticker

  /**
   * After cancellation, hand every value still buffered in the channels to
   * its handler (channel order) before the task completes.
   *
   * @default false
   */
  cleanup?: boolean
}
