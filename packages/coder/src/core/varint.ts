import type { ByteSink } from "../ports/byte-sink"
import type { ByteSource } from "../ports/byte-source"
import { DecodingError, EncodingError } from "./errors"

/** Upper bound for decoded lengths and element counts, 64 MiB. */
export const DEFAULT_MAX_LENGTH = 64 * 1024 * 1024

const INT32_MIN = -(2 ** 31)
const INT32_MAX = 2 ** 31 - 1

export function isInt32(value: unknown): value is number {
  return Number.isInteger(value) && Number(value) >= INT32_MIN && Number(value) <= INT32_MAX
}

export function assertInt32(value: unknown, coder: string): asserts value is number {
  if (!isInt32(value)) {
    throw new EncodingError(`${coder} cannot encode ${String(value)}: not a 32-bit integer`, {
      code: "unsupported_value",
      context: { coder, value },
    })
  }
}

/**
 * Unsigned LEB128 of the two's-complement bits of a 32-bit integer: 1 to 5 bytes,
 * negative numbers always take 5.
 */
export function writeVarInt(sink: ByteSink, value: number): void {
  let bits = value >>> 0

  while (bits >= 0x80) {
    sink.writeByte((bits & 0x7f) | 0x80)
    bits >>>= 7
  }

  sink.writeByte(bits)
}

export function readVarInt(source: ByteSource): number {
  let result = 0

  for (let shift = 0; shift < 35; shift += 7) {
    const byte = source.readByte()

    // fifth byte carries the top 4 bits and no continuation
    if (shift === 28 && (byte & 0xf0) !== 0) {
      throw new DecodingError("VarInt does not fit in 32 bits", {
        code: "malformed_varint",
        context: { lastByte: byte },
      })
    }

    result |= (byte & 0x7f) << shift

    if ((byte & 0x80) === 0) {
      // a zero final byte after a continuation means padding
      if (byte === 0 && shift > 0) {
        throw new DecodingError("VarInt is not minimally encoded", {
          code: "malformed_varint",
          context: { length: shift / 7 + 1 },
        })
      }

      return result
    }
  }

  throw new DecodingError("VarInt longer than 5 bytes", { code: "malformed_varint" })
}

/**
 * Write a VarInt length or count, refusing anything `readLength` would reject
 * with the same `maxLength`. Nothing is written when the check fails.
 */
export function writeLength(
  sink: ByteSink,
  length: number,
  maxLength: number,
  coder: string,
): void {
  if (length > maxLength) {
    throw new EncodingError(`${coder} cannot encode length ${length} above ${maxLength}`, {
      code: "unsupported_value",
      context: { coder, length, maxLength },
    })
  }

  writeVarInt(sink, length)
}

/**
 * Read a VarInt length or count and check it against `maxLength`.
 */
export function readLength(source: ByteSource, maxLength: number): number {
  const length = readVarInt(source)

  if (length < 0 || length > maxLength) {
    throw new DecodingError(`Length ${length} outside [0, ${maxLength}]`, {
      code: "length_out_of_range",
      context: { length, maxLength },
    })
  }

  return length
}
