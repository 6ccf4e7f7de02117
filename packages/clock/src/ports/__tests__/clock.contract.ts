import { describe, expect, it } from "vitest"
import type { Clock } from "../clock"

export type ClockHarness = {
  name: string
  make: () => Clock
}

export function describeClockContract(h: ClockHarness) {
  describe(`${h.name} (Clock contract)`, () => {
    describe("TimeSource", () => {
      it("now() returns a Date", () => {
        const clock = h.make()
        const result = clock.now()

        expect(result).toBeInstanceOf(Date)
      })

      it("nowMs() returns a number", () => {
        const clock = h.make()
        const result = clock.nowMs()

        expect(typeof result).toBe("number")
      })

      it("nowMicros() returns a whole number", () => {
        const clock = h.make()
        const result = clock.nowMicros()

        expect(Number.isInteger(result)).toBe(true)
      })

      it("now() and nowMs() are consistent", () => {
        const clock = h.make()
        const date = clock.now()
        const ms = clock.nowMs()

        expect(Math.abs(date.getTime() - ms)).toBeLessThan(5)
      })

      it("nowMs() and nowMicros() are consistent", () => {
        const clock = h.make()
        const ms = clock.nowMs()
        const micros = clock.nowMicros()

        expect(Math.abs(micros / 1000 - ms)).toBeLessThan(50)
      })
    })
  })
}
