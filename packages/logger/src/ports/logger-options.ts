import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. How a line looks is decided by
 * the destination (see `createLineDestination`), not here.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Any log entries below this level are ignored.
   */
  level: LogLevelName

  /**
   * Render human-readable header lines on stderr instead of JSON.
   *
   * @remarks
   * Ignored when the adapter is given an explicit destination.
   */
  prettify?: boolean
}
