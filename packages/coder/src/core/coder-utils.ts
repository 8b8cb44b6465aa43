import { BufferSink } from "../adapters/memory/buffer-sink"
import { BufferSource } from "../adapters/memory/buffer-source"
import { Context } from "../ports/context"
import type { Coder } from "./coder"
import { DecodingError } from "./errors"

/**
 * Encode a single value to a fresh byte array.
 */
export function encodeToBytes<T>(
  coder: Coder<T>,
  value: T,
  context: Context = Context.OUTER,
): Uint8Array {
  const sink = new BufferSink()

  if (context === Context.NESTED) {
    coder.encodeNested(value, sink)
  } else {
    coder.encodeOuter(value, sink)
  }

  return sink.toBytes()
}

/**
 * Decode a single value that must span all of `bytes`.
 *
 * @throws DecodingError with code `trailing_bytes` when bytes are left over
 */
export function decodeFromBytes<T>(
  coder: Coder<T>,
  bytes: Uint8Array,
  context: Context = Context.OUTER,
): T {
  const source = new BufferSource(bytes)

  const value =
    context === Context.NESTED ? coder.decodeNested(source) : coder.decodeOuter(source)

  if (source.remaining() > 0) {
    throw new DecodingError(
      `${String(coder)} left ${source.remaining()} of ${bytes.length} bytes unread`,
      {
        code: "trailing_bytes",
        context: { coder: String(coder), remaining: source.remaining(), total: bytes.length },
      },
    )
  }

  return value
}

/**
 * Deep copy through the coder's outer encoding.
 */
export function clone<T>(coder: Coder<T>, value: T): T {
  return decodeFromBytes(coder, encodeToBytes(coder, value))
}
