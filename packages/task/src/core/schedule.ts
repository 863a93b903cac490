import type { Milliseconds, UnixMs } from "@snapcfg/clock"

/**
 * Next slot of a fixed-period schedule after `previous`, skipping every slot
 * that `now` has already passed.
 */
export function nextSlot(previous: UnixMs, intervalMs: Milliseconds, now: UnixMs): UnixMs {
  const missed = Math.max(0, Math.floor((now - previous) / intervalMs))

  return previous + (missed + 1) * intervalMs
}

export function assertInterval(intervalMs: Milliseconds, name: string): void {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError(`${name} must be a positive number of milliseconds (got ${intervalMs})`)
  }
}
