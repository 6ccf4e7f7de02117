import { performance } from "node:perf_hooks"
import type { Clock } from "../ports/clock"
import type { Microseconds, Milliseconds } from "../ports/time"

const MICROS_PER_MS = 1000

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  /**
   * Wall-clock milliseconds from `Date.now()`, with the sub-millisecond digits
   * taken from the high-resolution timer. Follows clock steps the same way
   * `nowMs()` does; not guaranteed monotonic.
   */
  nowMicros(): Microseconds {
    const subMillis = Math.floor(performance.now() * MICROS_PER_MS) % MICROS_PER_MS

    return Date.now() * MICROS_PER_MS + subMillis
  }
}
