export { BaseError, type BaseErrorOptions, serializeError } from "./core/base-error"
export type { SerializeOptions } from "./core/base-error"
export { errorChain, errorMessages } from "./core/utils/error-chain"
export { type ToAppErrorOptions, toAppError } from "./core/utils/to-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
