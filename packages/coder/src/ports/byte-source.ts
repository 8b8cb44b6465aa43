/**
 * Origin of encoded bytes, read front to back.
 *
 * Reading past the end is an `IOFailure` with code `end_of_stream`.
 */
export interface ByteSource {
  /** Read exactly `length` bytes. */
  read(length: number): Uint8Array

  readByte(): number

  /** Read everything up to the end of the stream. Used by outer-context decoders. */
  readAll(): Uint8Array

  /** Bytes left before the end of the stream. */
  remaining(): number
}
