export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export { createError } from "./core/utils/create-error"
export { errorChain } from "./core/utils/error-chain"
export { formatErrorChain } from "./core/utils/format-error-chain"
export { toAppError } from "./core/utils/to-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
