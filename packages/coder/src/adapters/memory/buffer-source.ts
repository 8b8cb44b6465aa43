import { IOFailure } from "../../core/errors"
import type { ByteSource } from "../../ports/byte-source"

/**
 * In-memory source over a byte array. Returned chunks are copies.
 */
export class BufferSource implements ByteSource {
  private position = 0
  private closed = false

  constructor(private readonly bytes: Uint8Array) {}

  read(length: number): Uint8Array {
    this.ensureAvailable(length)

    const chunk = this.bytes.slice(this.position, this.position + length)
    this.position += length

    return chunk
  }

  readByte(): number {
    this.ensureAvailable(1)

    const byte = this.bytes[this.position] ?? 0
    this.position += 1

    return byte
  }

  readAll(): Uint8Array {
    return this.read(this.remaining())
  }

  remaining(): number {
    return this.bytes.length - this.position
  }

  /** Offset of the next byte to be read. */
  offset(): number {
    return this.position
  }

  close(): void {
    this.closed = true
  }

  private ensureAvailable(length: number): void {
    if (this.closed) {
      throw new IOFailure("Cannot read from a closed source", {
        code: "source_closed",
        context: { offset: this.position },
      })
    }

    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`Invalid read length: ${length}`)
    }

    if (length > this.remaining()) {
      throw new IOFailure(
        `Unexpected end of stream: wanted ${length} bytes, ${this.remaining()} left`,
        {
          code: "end_of_stream",
          context: { offset: this.position, wanted: length, remaining: this.remaining() },
        },
      )
    }
  }
}
