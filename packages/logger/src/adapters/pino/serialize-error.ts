import { errWithCause } from "pino-std-serializers"

/** Fields of a logged error, in output order. */
const LOGGED_FIELDS = ["type", "message", "code", "coder", "reasons", "context", "stack"] as const

/**
 * pino `err` serializer for coder failures.
 *
 * Keeps `code`, `coder`, `reasons` and `context` at every level of the cause
 * chain; `BaseError` bookkeeping such as `timestamp` is left out.
 */
export function serializeCoderError(value: unknown): unknown {
  return value instanceof Error ? pick(errWithCause(value)) : value
}

function pick(serialized: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}

  for (const key of LOGGED_FIELDS) {
    if (serialized[key] !== undefined) out[key] = serialized[key]
  }

  if (isRecord(serialized.cause)) out.cause = pick(serialized.cause)

  return out
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}
