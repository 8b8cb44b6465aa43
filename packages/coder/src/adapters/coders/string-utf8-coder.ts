import { CustomCoder } from "../../core/custom-coder"
import { DecodingError, EncodingError } from "../../core/errors"
import { DEFAULT_MAX_LENGTH, readLength, writeLength } from "../../core/varint"
import type { ByteSink } from "../../ports/byte-sink"
import type { ByteSource } from "../../ports/byte-source"
import type { LengthPrefixedCoderOptions } from "./coder-options"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

/**
 * Strings as UTF-8. Nested: VarInt byte length then the bytes. Outer: the
 * bytes alone, running to the end of the stream.
 */
export class StringUtf8Coder extends CustomCoder<string> {
  private readonly maxLength: number

  constructor(options: LengthPrefixedCoderOptions = {}) {
    super()
    this.maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH
  }

  static of(options?: LengthPrefixedCoderOptions): StringUtf8Coder {
    return new StringUtf8Coder(options)
  }

  encode(value: string, sink: ByteSink): void {
    const bytes = this.toUtf8(value)
    writeLength(sink, bytes.length, this.maxLength, this.toString())
    sink.write(bytes)
  }

  decode(source: ByteSource): string {
    return this.fromUtf8(source.read(readLength(source, this.maxLength)))
  }

  override encodeOuter(value: string, sink: ByteSink): void {
    sink.write(this.toUtf8(value))
  }

  override decodeOuter(source: ByteSource): string {
    return this.fromUtf8(source.readAll())
  }

  override verifyDeterminism(): void {}

  override consistentWithEquals(): boolean {
    return true
  }

  private toUtf8(value: unknown): Uint8Array {
    if (typeof value !== "string") {
      throw new EncodingError(`${this.toString()} cannot encode a ${typeof value}`, {
        code: "unsupported_value",
        context: { coder: this.toString(), type: typeof value },
      })
    }

    return encoder.encode(value)
  }

  private fromUtf8(bytes: Uint8Array): string {
    try {
      return decoder.decode(bytes)
    } catch (err) {
      throw new DecodingError(`${this.toString()} read invalid UTF-8`, {
        context: { coder: this.toString(), length: bytes.length },
        cause: err,
      })
    }
  }
}
