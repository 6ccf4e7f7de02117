import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"
import { errorChain } from "./error-chain"

function firstCoded(err: Error): BaseError | undefined {
  for (const link of errorChain(err)) {
    if (link instanceof BaseError) return link
  }

  return undefined
}

/**
 * Convert any caught value to an AppError.
 *
 * A BaseError passes through. A plain Error that wraps a BaseError somewhere in
 * its cause chain takes that error's code and flags, so a `sink_closed` thrown
 * deep inside a stream callback is still reported as `sink_closed`. Anything
 * else is wrapped as non-operational under `fallbackCode`.
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (err instanceof BaseError) return err

  if (err instanceof Error) {
    const coded = firstCoded(err)

    return new BaseError(err.message, {
      code: coded?.code ?? fallbackCode,
      context: coded ? { ...coded.context } : {},
      cause: err,
      isRetryable: coded?.isRetryable ?? false,
      isOperational: coded?.isOperational ?? false,
    })
  }

  const thrown = typeof err === "string" ? err : "Unknown error"

  return new BaseError(thrown, {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}
