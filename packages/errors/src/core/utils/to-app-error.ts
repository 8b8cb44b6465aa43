import type { AppError, ErrorCode, ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

export type ToAppErrorOptions = {
  /** Code for anything that is not already a `BaseError`. Default: "unknown" */
  code?: ErrorCode
  /** What was being attempted; prefixed to the wrapped message */
  message?: string
  context?: ErrorContext
}

/**
 * `BaseError`s pass through untouched. Anything else thrown is wrapped as a
 * non-operational `BaseError` that keeps the thrown value as its cause and
 * records its type under `thrownType`.
 */
export function toAppError(thrown: unknown, options: ToAppErrorOptions = {}): AppError {
  if (thrown instanceof BaseError) return thrown

  const detail =
    thrown instanceof Error
      ? thrown.message
      : typeof thrown === "string"
        ? thrown
        : `Non-error value thrown (${typeOf(thrown)})`

  return new BaseError(options.message ? `${options.message}: ${detail}` : detail, {
    code: options.code ?? "unknown",
    context: { ...options.context, thrownType: typeOf(thrown) },
    cause: thrown,
    isOperational: false,
  })
}

function typeOf(thrown: unknown): string {
  if (thrown === null) return "null"
  if (typeof thrown !== "object") return typeof thrown

  return thrown.constructor?.name ?? "Object"
}
