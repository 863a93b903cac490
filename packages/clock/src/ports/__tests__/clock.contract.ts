import { describe, expect, it } from "vitest"
import type { Clock } from "../clock"

export type ClockHarness = {
  name: string
  make: () => Clock
}

export function describeClockContract(h: ClockHarness) {
  describe(`${h.name} (Clock contract)`, () => {
    describe("TimeSource", () => {
      it("now() and nowMs() describe the same instant", () => {
        const clock = h.make()

        expect(clock.now()).toBeInstanceOf(Date)
        expect(Math.abs(clock.now().getTime() - clock.nowMs())).toBeLessThan(5)
      })
    })

    describe("Sleeper", () => {
      it("sleep(0) resolves immediately", async () => {
        const clock = h.make()

        await expect(clock.sleep(0)).resolves.toBeUndefined()
      })

      it("sleep() resolves at once when the signal is already aborted", async () => {
        const clock = h.make()
        const ac = new AbortController()
        ac.abort()

        await expect(clock.sleep(60_000, ac.signal)).resolves.toBeUndefined()
      })

      it("sleep() resolves when the signal aborts while sleeping", async () => {
        const clock = h.make()
        const ac = new AbortController()

        const sleeping = clock.sleep(60_000, ac.signal)
        ac.abort()

        await expect(sleeping).resolves.toBeUndefined()
      })
    })
  })
}
