export type LogContext = {
  requestId: string
  traceId: string
  spanId: string

  service: string
  env: string

  /** Code location that emitted the entry, rendered as the module path field. */
  module: string
  /** Free-form category; defaults to `module` when not bound. */
  target: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
