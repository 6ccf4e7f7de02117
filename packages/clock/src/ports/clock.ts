import type { Microseconds, Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds

  /**
   * Current time as whole microseconds since Unix epoch.
   *
   * @remarks
   * Resolution depends on the adapter. `Date` only carries milliseconds, so
   * sub-millisecond digits come from the adapter's own high-resolution source.
   */
  nowMicros(): Microseconds
}

export type Clock = TimeSource
