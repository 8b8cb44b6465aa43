import { CustomCoder } from "../../core/custom-coder"
import { EncodingError } from "../../core/errors"
import { DEFAULT_MAX_LENGTH, readLength, writeLength } from "../../core/varint"
import type { ByteSink } from "../../ports/byte-sink"
import type { ByteSource } from "../../ports/byte-source"
import type { LengthPrefixedCoderOptions } from "./coder-options"

/**
 * Raw bytes. Nested: VarInt length then the bytes. Outer: the bytes alone,
 * running to the end of the stream.
 */
export class ByteArrayCoder extends CustomCoder<Uint8Array> {
  private readonly maxLength: number

  constructor(options: LengthPrefixedCoderOptions = {}) {
    super()
    this.maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH
  }

  static of(options?: LengthPrefixedCoderOptions): ByteArrayCoder {
    return new ByteArrayCoder(options)
  }

  encode(value: Uint8Array, sink: ByteSink): void {
    this.check(value)
    writeLength(sink, value.length, this.maxLength, this.toString())
    sink.write(value)
  }

  decode(source: ByteSource): Uint8Array {
    return source.read(readLength(source, this.maxLength))
  }

  override encodeOuter(value: Uint8Array, sink: ByteSink): void {
    this.check(value)
    sink.write(value)
  }

  override decodeOuter(source: ByteSource): Uint8Array {
    return source.readAll()
  }

  override verifyDeterminism(): void {}

  private check(value: unknown): asserts value is Uint8Array {
    if (!(value instanceof Uint8Array)) {
      throw new EncodingError(`${this.toString()} cannot encode a non-Uint8Array value`, {
        code: "unsupported_value",
        context: { coder: this.toString(), type: typeof value },
      })
    }
  }
}
