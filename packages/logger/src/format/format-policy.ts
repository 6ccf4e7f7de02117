import { SystemClock, type TimeSource } from "@tzline/clock"
import { createError } from "@tzline/errors"

export const timestampPrecisions = ["seconds", "millis", "micros", "nanos"] as const

export type TimestampPrecision = (typeof timestampPrecisions)[number]

/**
 * Timestamp pattern per precision. `nanos` deliberately shares the six-digit
 * pattern with `micros`.
 */
export const TIMESTAMP_FORMATS = {
  seconds: "YYYY-MM-DD HH:mm:ss Z",
  millis: "YYYY-MM-DD HH:mm:ss.SSS Z",
  micros: "YYYY-MM-DD HH:mm:ss.SSSSSS Z",
  nanos: "YYYY-MM-DD HH:mm:ss.SSSSSS Z",
} as const satisfies Record<TimestampPrecision, string>

/** Exclusive bound on the magnitude of a fixed UTC offset, in seconds. */
export const MAX_UTC_OFFSET_SECONDS = 86_400

export type FormatPolicy = Readonly<{
  timestampFormat: string
  /** Fixed offset from UTC in seconds, east positive. */
  utcOffset: number
  showTimestamp: boolean
  showLevel: boolean
  showModulePath: boolean
  showTarget: boolean
  /** Spaces before each continuation line, or `null` to write bodies verbatim. */
  indent: number | null
  lineTerminator: string
}>

export type FormatPolicyOptions = {
  /**
   * Seconds east of UTC.
   *
   * @remarks
   * Absent or invalid values fall back to the local offset at construction
   * time, without an error. The offset is then fixed for the policy's lifetime
   * and does not follow DST changes.
   */
  utcOffset?: number | undefined
  /** Default: `millis` */
  precision?: TimestampPrecision | undefined
  showTimestamp?: boolean
  showLevel?: boolean
  showModulePath?: boolean
  showTarget?: boolean
  /** Default: 4 */
  indent?: number | null
  /** Default: `"\n"` */
  lineTerminator?: string
}

export type FormatPolicyDeps = {
  /** Source of "now" for resolving the local offset. */
  clock?: TimeSource
}

export function isValidUtcOffset(seconds: number): boolean {
  return (
    Number.isInteger(seconds) &&
    seconds > -MAX_UTC_OFFSET_SECONDS &&
    seconds < MAX_UTC_OFFSET_SECONDS
  )
}

/** Local UTC offset in seconds at the given instant. */
export function localUtcOffset(at: Date): number {
  return 0 - at.getTimezoneOffset() * 60
}

function resolveUtcOffset(requested: number | undefined, clock: TimeSource): number {
  if (requested !== undefined && isValidUtcOffset(requested)) return requested

  return localUtcOffset(clock.now())
}

export function createFormatPolicy(
  options: FormatPolicyOptions = {},
  deps: FormatPolicyDeps = {},
): FormatPolicy {
  const indent = options.indent === undefined ? 4 : options.indent

  if (indent !== null && !(Number.isInteger(indent) && indent >= 0)) {
    throw createError("invalid_format_policy", `indent must be a non-negative integer, got ${indent}`, {
      context: { indent },
      isOperational: false,
    })
  }

  return Object.freeze({
    timestampFormat: TIMESTAMP_FORMATS[options.precision ?? "millis"],
    utcOffset: resolveUtcOffset(options.utcOffset, deps.clock ?? new SystemClock()),
    showTimestamp: options.showTimestamp ?? true,
    showLevel: options.showLevel ?? true,
    showModulePath: options.showModulePath ?? false,
    showTarget: options.showTarget ?? true,
    indent,
    lineTerminator: options.lineTerminator ?? "\n",
  })
}
