export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels.
 *
 * Same values pino uses on the wire, so a record's `level` field maps straight
 * back to a name (higher = more severe).
 */
export const LogLevels = {
  /** Finest-grained diagnostic information. */
  Trace: 10,
  /** Debug-level information useful during development and investigation. */
  Debug: 20,
  /** High-level informational messages about normal operation. */
  Info: 30,
  /** Indications of potential issues or unexpected situations. */
  Warn: 40,
  /** Errors that indicate a failure in the current operation. */
  Error: 50,
  /** Severe errors after which the process may be unable to continue. */
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export const LEVEL_SEVERITY: Readonly<Record<LogLevelName, LogLevel>> = {
  trace: LogLevels.Trace,
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
  fatal: LogLevels.Fatal,
}

export function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === "string" && logLevelNames.some((name) => name === value)
}

/**
 * Name for a numeric severity: the exact level, else the nearest lower one.
 * Anything below `trace` is reported as `trace`.
 */
export function levelFromSeverity(severity: number): LogLevelName {
  let match: LogLevelName = "trace"

  for (const name of logLevelNames) {
    if (LEVEL_SEVERITY[name] <= severity) match = name
  }

  return match
}

/** Upper-case label as printed in a line header, e.g. `WARN`. */
export function levelLabel(level: LogLevelName): string {
  return level.toUpperCase()
}
