import type { Microseconds } from "@tzline/clock"

const TOKEN = /YYYY|MM|DD|HH|mm|ss|S+|Z/g

const MICROS_PER_SECOND = 1_000_000

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0")
}

/** `+hh:mm` / `-hh:mm`; leftover seconds in the offset are not shown. */
export function formatUtcOffset(offsetSeconds: number): string {
  const sign = offsetSeconds < 0 ? "-" : "+"
  const abs = Math.abs(offsetSeconds)

  return `${sign}${pad(Math.floor(abs / 3600), 2)}:${pad(Math.floor((abs % 3600) / 60), 2)}`
}

/**
 * Format an instant as wall-clock time at a fixed UTC offset.
 *
 * Tokens: `YYYY MM DD HH mm ss`, a run of `S` for truncated fractional
 * digits, and `Z` for the offset. Other characters are copied as they are.
 */
export function formatTimestamp(
  epochMicros: Microseconds,
  offsetSeconds: number,
  pattern: string,
): string {
  const local = epochMicros + offsetSeconds * MICROS_PER_SECOND
  const fraction = ((local % MICROS_PER_SECOND) + MICROS_PER_SECOND) % MICROS_PER_SECOND
  const wall = new Date((local - fraction) / 1000)

  return pattern.replace(TOKEN, (token) => {
    switch (token) {
      case "YYYY":
        return pad(wall.getUTCFullYear(), 4)
      case "MM":
        return pad(wall.getUTCMonth() + 1, 2)
      case "DD":
        return pad(wall.getUTCDate(), 2)
      case "HH":
        return pad(wall.getUTCHours(), 2)
      case "mm":
        return pad(wall.getUTCMinutes(), 2)
      case "ss":
        return pad(wall.getUTCSeconds(), 2)
      case "Z":
        return formatUtcOffset(offsetSeconds)
      default:
        return pad(fraction, 6).slice(0, token.length).padEnd(token.length, "0")
    }
  })
}
