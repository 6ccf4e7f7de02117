import type { ErrorCode } from "../../ports/error"
import { BaseError, type BaseErrorOptions } from "../base-error"

/**
 * Shorthand for `new BaseError(message, { code, ...options })`.
 *
 * @example
 * ```ts
 * throw createError("sink_closed", "Output stream has been closed", {
 *   context: { fd: 2 },
 * })
 * ```
 */
export function createError<C extends ErrorCode>(
  code: C,
  message: string,
  options?: Omit<BaseErrorOptions<C>, "code">,
): BaseError<C> {
  return new BaseError(message, { code, ...options })
}
