import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

type PendingSleep = {
  id: number
  wakeAt: UnixMs
  resolve: () => void
}

/**
 * Manually driven clock for deterministic schedule tests.
 *
 * `sleep()` only resolves when `advance()`/`set()` moves time past its wake-up
 * instant (or its signal aborts). `advance()` wakes sleepers one at a time in
 * deadline order and yields to the event loop between wake-ups, so a loop that
 * sleeps again right after waking is scheduled before time moves on.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private nextId = 0
  private readonly pending = new Map<number, PendingSleep>()

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  /** Number of sleeps waiting for time to move. */
  get pendingSleeps(): number {
    return this.pending.size
  }

  async advance(ms: Milliseconds): Promise<void> {
    await this.set(this.time + ms)
  }

  async set(target: UnixMs): Promise<void> {
    // Lets work spawned just before this call register its sleeps first.
    await flush()

    for (;;) {
      const next = this.earliestDue(target)
      if (!next) break

      this.time = Math.max(this.time, next.wakeAt)
      this.pending.delete(next.id)
      next.resolve()

      await flush()
    }

    this.time = target
    await flush()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return Promise.resolve()
    if (signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const id = this.nextId++

      const onAbort = () => {
        this.pending.delete(id)
        resolve()
      }

      this.pending.set(id, {
        id,
        wakeAt: this.time + ms,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        },
      })

      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }

  private earliestDue(target: UnixMs): PendingSleep | undefined {
    let earliest: PendingSleep | undefined

    for (const sleep of this.pending.values()) {
      if (sleep.wakeAt > target) continue
      if (!earliest || sleep.wakeAt < earliest.wakeAt) earliest = sleep
    }

    return earliest
  }
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}
