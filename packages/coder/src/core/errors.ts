import { BaseError, type BaseErrorOptions, type ErrorCode } from "@coderkit/errors"
import type { Coder } from "./coder"

type CoderErrorOptions<C extends ErrorCode> = Omit<BaseErrorOptions<C>, "code"> & {
  code?: C
}

export type EncodingErrorCode = "encoding_failed" | "unsupported_value"

/**
 * The value-specific logic cannot represent a value.
 */
export class EncodingError extends BaseError<EncodingErrorCode> {
  constructor(message: string, options: CoderErrorOptions<EncodingErrorCode> = {}) {
    super(message, { ...options, code: options.code ?? "encoding_failed" })
  }
}

export type DecodingErrorCode =
  | "decoding_failed"
  | "length_out_of_range"
  | "malformed_varint"
  | "trailing_bytes"

/**
 * The bytes read are not a valid encoding under the requested context.
 */
export class DecodingError extends BaseError<DecodingErrorCode> {
  constructor(message: string, options: CoderErrorOptions<DecodingErrorCode> = {}) {
    super(message, { ...options, code: options.code ?? "decoding_failed" })
  }
}

export type IOFailureCode = "io_failure" | "end_of_stream" | "sink_closed" | "source_closed"

/**
 * The underlying sink or source failed. Propagated as-is; never retried here.
 */
export class IOFailure extends BaseError<IOFailureCode> {
  constructor(message: string, options: CoderErrorOptions<IOFailureCode> = {}) {
    super(message, { ...options, code: options.code ?? "io_failure" })
  }
}

export type NondeterminismErrorOptions = Readonly<{
  cause?: unknown
}>

/**
 * A coder cannot be shown to produce byte-identical output for equal values.
 *
 * Raised by `verifyDeterminism()` at validation time, never while encoding.
 * Callers that group or key by encoded bytes must treat it as a hard failure.
 */
export class NondeterminismError extends BaseError<"nondeterministic_coder"> {
  /** Description of the offending coder, e.g. `ListCoder(PointCoder)` */
  readonly coder: string

  readonly reasons: readonly string[]

  constructor(
    coder: Coder<unknown> | string,
    reasons: string | readonly string[],
    options: NondeterminismErrorOptions = {},
  ) {
    const description = String(coder)
    const list = typeof reasons === "string" ? [reasons] : [...reasons]

    super(`${description} is not deterministic: ${list.join("; ")}`, {
      code: "nondeterministic_coder",
      context: { coder: description, reasons: list },
      cause: options.cause,
    })

    this.coder = description
    this.reasons = Object.freeze(list)
  }
}
