/** Machine-readable error code, always lower snake case (e.g. `sink_closed`). */
export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors.
 * Carries structured data (offsets, fds, raw lines) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if retrying the same call might succeed */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`) versus programmer error (`false`).
   *
   * @remarks
   * A closed output stream is operational; reusing a consumed renderer is not.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape, used when an error has to travel through a log record.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
