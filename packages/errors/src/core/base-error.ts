import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value to a consistent shape.
 *
 * BaseError keeps its code and context, a plain Error gets code `unknown`,
 * anything else is wrapped as `NonErrorThrown`. A cause that points back into
 * the chain is dropped.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  return serializeLink(err, options?.includeStack ?? false, new WeakSet())
}

function serializeLink(err: unknown, includeStack: boolean, seen: WeakSet<object>): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isOperational: false,
      isRetryable: false,
      timestamp: new Date().toISOString(),
    }
  }

  seen.add(err)

  const cause = err.cause
  const followCause = cause !== undefined && !(typeof cause === "object" && cause !== null && seen.has(cause))
  const base = err instanceof BaseError

  return {
    name: err.name,
    code: base ? err.code : "unknown",
    message: err.message,
    context: base ? { ...err.context } : {},
    isOperational: base ? err.isOperational : false,
    isRetryable: base ? err.isRetryable : false,
    timestamp: (base ? err.timestamp : new Date()).toISOString(),
    ...(followCause ? { cause: serializeLink(cause, includeStack, seen) } : {}),
    ...(includeStack && err.stack ? { stack: err.stack } : {}),
  }
}
