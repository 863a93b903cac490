import type { TaskFn, TaskHandle } from "../ports/task"

/**
 * Links `child` to `parent`: aborting the parent aborts the child with the
 * same reason. Returns a function that removes the link.
 */
export function linkSignal(parent: AbortSignal | undefined, child: AbortController): () => void {
  if (!parent) return () => {}

  if (parent.aborted) {
    child.abort(parent.reason)
    return () => {}
  }

  const onAbort = () => child.abort(parent.reason)
  parent.addEventListener("abort", onAbort, { once: true })

  return () => parent.removeEventListener("abort", onAbort)
}

export class Task implements TaskHandle {
  private readonly controller = new AbortController()
  private readonly completion: Promise<void>
  private finished = false
  private failure: unknown

  constructor(parent: AbortSignal | undefined, fn: TaskFn) {
    const unlink = linkSignal(parent, this.controller)
    const signal = this.controller.signal

    // Starts on the next microtask so the caller holds the handle first.
    this.completion = Promise.resolve()
      .then(() => fn(signal))
      .catch((err: unknown) => {
        this.failure = err
      })
      .finally(() => {
        this.finished = true
        unlink()
        this.controller.abort()
      })
  }

  get done(): boolean {
    return this.finished
  }

  get error(): unknown {
    return this.failure
  }

  cancel(): void {
    this.controller.abort()
  }

  join(signal?: AbortSignal): Promise<void> {
    if (this.finished || !signal) return this.completion
    if (signal.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const onAbort = () => resolve()
      signal.addEventListener("abort", onAbort, { once: true })

      void this.completion.then(() => {
        signal.removeEventListener("abort", onAbort)
        resolve()
      })
    })
  }
}
