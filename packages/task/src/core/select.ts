import { type Clock, SystemClock, type UnixMs } from "@snapcfg/clock"
import type { ReceiveChannel } from "../ports/channel"
import type { ChanOptions, Handler, TaskHandle, Ticker } from "../ports/task"
import { assertInterval, nextSlot } from "./schedule"
import { linkSignal, Task } from "./task"

type SelectCase = {
  channel: ReceiveChannel<unknown>
  /** Takes one buffered value and handles it. `false` when nothing was buffered. */
  serve(signal: AbortSignal): Promise<boolean>
}

function bind<T>(channel: ReceiveChannel<T>, handler: Handler<T>): SelectCase {
  return {
    channel,
    serve: async (signal) => {
      const received = channel.tryReceive()
      if (!received.ok) return false

      await handler(received.value, signal)
      return true
    },
  }
}

function validateTicker(ticker: Ticker | undefined): void {
  if (!ticker) return

  assertInterval(ticker.intervalMs, "ticker.intervalMs")

  if (typeof ticker.fn !== "function") {
    throw new TypeError("ticker.fn must be a function")
  }
}

/**
 * Single loop multiplexing several channels and an optional ticker.
 *
 * - a due ticker slot is served before channel values
 * - ready channels are served one value at a time in rotating order
 * - the loop ends on cancellation, or by itself once every channel is closed
 *   and drained and there is no ticker
 */
class SelectLoop {
  private rotation = 0

  constructor(
    private readonly cases: SelectCase[],
    private readonly options: ChanOptions,
    private readonly clock: Clock,
  ) {}

  async run(signal: AbortSignal): Promise<void> {
    const { ticker } = this.options
    let due: UnixMs | undefined = ticker ? this.clock.nowMs() + ticker.intervalMs : undefined

    while (!signal.aborted) {
      if (ticker && due !== undefined && this.clock.nowMs() >= due) {
        await ticker.fn(signal)
        due = nextSlot(due, ticker.intervalMs, this.clock.nowMs())
        continue
      }

      if (await this.serveNext(signal)) continue

      if (!ticker && this.cases.every((c) => c.channel.drained)) return

      await this.waitForWork(signal, due)
    }

    if (this.options.cleanup) await this.drainAll(signal)
  }

  private async serveNext(signal: AbortSignal): Promise<boolean> {
    const count = this.cases.length

    for (let offset = 0; offset < count; offset++) {
      const index = (this.rotation + offset) % count
      const selected = this.cases[index]

      if (selected && (await selected.serve(signal))) {
        this.rotation = (index + 1) % count
        return true
      }
    }

    return false
  }

  private async waitForWork(signal: AbortSignal, due: UnixMs | undefined): Promise<void> {
    const waiter = new AbortController()
    const unlink = linkSignal(signal, waiter)

    try {
      const waits = this.cases.map((c) => c.channel.ready(waiter.signal))

      if (due !== undefined) {
        waits.push(this.clock.sleep(due - this.clock.nowMs(), waiter.signal))
      }

      await Promise.race(waits)
    } finally {
      unlink()
      waiter.abort()
    }
  }

  private async drainAll(signal: AbortSignal): Promise<void> {
    for (const c of this.cases) {
      while (await c.serve(signal)) {
        // keep taking until the buffer is empty
      }
    }
  }
}

function select(cases: SelectCase[], options: ChanOptions): TaskHandle {
  validateTicker(options.ticker)

  const loop = new SelectLoop(cases, options, options.clock ?? new SystemClock())

  return new Task(options.signal, (signal) => loop.run(signal))
}

/** Handles values from one channel until cancelled. */
export function chan<T>(ch: ReceiveChannel<T>, fn: Handler<T>, options: ChanOptions = {}): TaskHandle {
  return select([bind(ch, fn)], options)
}

export function chan2<T1, T2>(
  ch1: ReceiveChannel<T1>,
  f1: Handler<T1>,
  ch2: ReceiveChannel<T2>,
  f2: Handler<T2>,
  options: ChanOptions = {},
): TaskHandle {
  return select([bind(ch1, f1), bind(ch2, f2)], options)
}

export function chan3<T1, T2, T3>(
  ch1: ReceiveChannel<T1>,
  f1: Handler<T1>,
  ch2: ReceiveChannel<T2>,
  f2: Handler<T2>,
  ch3: ReceiveChannel<T3>,
  f3: Handler<T3>,
  options: ChanOptions = {},
): TaskHandle {
  return select([bind(ch1, f1), bind(ch2, f2), bind(ch3, f3)], options)
}

export function chan4<T1, T2, T3, T4>(
  ch1: ReceiveChannel<T1>,
  f1: Handler<T1>,
  ch2: ReceiveChannel<T2>,
  f2: Handler<T2>,
  ch3: ReceiveChannel<T3>,
  f3: Handler<T3>,
  ch4: ReceiveChannel<T4>,
  f4: Handler<T4>,
  options: ChanOptions = {},
): TaskHandle {
  return select([bind(ch1, f1), bind(ch2, f2), bind(ch3, f3), bind(ch4, f4)], options)
}

export function chan5<T1, T2, T3, T4, T5>(
  ch1: ReceiveChannel<T1>,
  f1: Handler<T1>,
  ch2: ReceiveChannel<T2>,
  f2: Handler<T2>,
  ch3: ReceiveChannel<T3>,
  f3: Handler<T3>,
  ch4: ReceiveChannel<T4>,
  f4: Handler<T4>,
  ch5: ReceiveChannel<T5>,
  f5: Handler<T5>,
  options: ChanOptions = {},
): TaskHandle {
  return select(
    [bind(ch1, f1), bind(ch2, f2), bind(ch3, f3), bind(ch4, f4), bind(ch5, f5)],
    options,
  )
}

export function chan6<T1, T2, T3, T4, T5, T6>(
  ch1: ReceiveChannel<T1>,
  f1: Handler<T1>,
  ch2: ReceiveChannel<T2>,
  f2: Handler<T2>,
  ch3: ReceiveChannel<T3>,
  f3: Handler<T3>,
  ch4: ReceiveChannel<T4>,
  f4: Handler<T4>,
  ch5: ReceiveChannel<T5>,
  f5: Handler<T5>,
  ch6: ReceiveChannel<T6>,
  f6: Handler<T6>,
  options: ChanOptions = {},
): TaskHandle {
  return select(
    [
      bind(ch1, f1),
      bind(ch2, f2),
      bind(ch3, f3),
      bind(ch4, f4),
      bind(ch5, f5),
      bind(ch6, f6),
    ],
    options,
  )
}
