import { type Milliseconds, SystemClock } from "@snapcfg/clock"
import type { TaskFn, TaskHandle, TaskOptions } from "../ports/task"
import { assertInterval, nextSlot } from "./schedule"
import { Task } from "./task"

/**
 * Calls `fn` every `intervalMs` until cancelled or until the parent signal
 * aborts. The first call happens one interval after the start.
 *
 * Calls never overlap: the next slot is only considered once the previous
 * call has settled, and slots that passed while it ran are skipped.
 */
export function tick(fn: TaskFn, intervalMs: Milliseconds, options: TaskOptions = {}): TaskHandle {
  assertInterval(intervalMs, "intervalMs")

  const clock = options.clock ?? new SystemClock()

  return new Task(options.signal, async (signal) => {
    let due = clock.nowMs() + intervalMs

    while (!signal.aborted) {
      await clock.sleep(due - clock.nowMs(), signal)
      if (signal.aborted) return

      await fn(signal)

      due = nextSlot(due, intervalMs, clock.nowMs())
    }
  })
}
