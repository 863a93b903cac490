import type { TaskFn, TaskHandle, TaskOptions } from "../ports/task"
import { Task } from "./task"

/**
 * Runs `fn` once in the background under a cancellable signal derived from
 * `options.signal`.
 *
 * @example
 * ```ts
 * const handle = run(async (signal) => {
 *   while (!signal.aborted) await pump(signal)
 * })
 *
 * handle.cancel()
 * await handle.join(AbortSignal.timeout(5_000))
 * ```
 */
export function run(fn: TaskFn, options: TaskOptions = {}): TaskHandle {
  return new Task(options.signal, fn)
}
