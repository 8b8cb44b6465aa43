import { IOFailure } from "../../core/errors"
import type { ByteSink } from "../../ports/byte-sink"

const INITIAL_CAPACITY = 64

/**
 * Growable in-memory sink.
 */
export class BufferSink implements ByteSink {
  private buffer: Uint8Array
  private length = 0
  private closed = false

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity))
  }

  write(bytes: Uint8Array): void {
    this.ensureOpen()
    this.reserve(bytes.length)
    this.buffer.set(bytes, this.length)
    this.length += bytes.length
  }

  writeByte(byte: number): void {
    this.ensureOpen()
    this.reserve(1)
    this.buffer[this.length] = byte & 0xff
    this.length += 1
  }

  /** Number of bytes written so far. */
  size(): number {
    return this.length
  }

  /** Copy of the bytes written so far. */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length)
  }

  close(): void {
    this.closed = true
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new IOFailure("Cannot write to a closed sink", {
        code: "sink_closed",
        context: { written: this.length },
      })
    }
  }

  private reserve(extra: number): void {
    const needed = this.length + extra
    if (needed <= this.buffer.length) return

    let capacity = this.buffer.length * 2
    while (capacity < needed) capacity *= 2

    const next = new Uint8Array(capacity)
    next.set(this.buffer.subarray(0, this.length))
    this.buffer = next
  }
}
