import type { Clock } from "../ports/clock"
import type { Microseconds, Milliseconds } from "../ports/time"

/**
 * Manually driven clock for tests.
 *
 * Time is kept in whole microseconds so sub-millisecond timestamps stay exact.
 */
export class FakeClock implements Clock {
  private micros: Microseconds

  constructor(start: Milliseconds = 0) {
    this.micros = Math.round(start * 1000)
  }

  now(): Date {
    return new Date(this.nowMs())
  }

  nowMs(): Milliseconds {
    return Math.floor(this.micros / 1000)
  }

  nowMicros(): Microseconds {
    return this.micros
  }

  advance(ms: Milliseconds): void {
    this.micros = this.micros + Math.round(ms * 1000)
  }

  set(ms: Milliseconds): void {
    this.micros = Math.round(ms * 1000)
  }

  setMicros(micros: Microseconds): void {
    this.micros = micros
  }
}
