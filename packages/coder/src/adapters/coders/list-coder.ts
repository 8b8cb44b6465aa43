import type { Coder } from "../../core/coder"
import { verifyComponentsDeterministic } from "../../core/determinism"
import { EncodingError } from "../../core/errors"
import { SelfDelimitingCoder } from "../../core/self-delimiting-coder"
import { DEFAULT_MAX_LENGTH, readLength, writeLength } from "../../core/varint"
import type { ByteSink } from "../../ports/byte-sink"
import type { ByteSource } from "../../ports/byte-source"
import type { LengthPrefixedCoderOptions } from "./coder-options"

/**
 * Arrays as a VarInt element count followed by each element, always encoded
 * in the nested context. The outer format is the nested one.
 */
export class ListCoder<T> extends SelfDelimitingCoder<T[]> {
  private readonly maxLength: number

  constructor(
    private readonly elementCoder: Coder<T>,
    options: LengthPrefixedCoderOptions = {},
  ) {
    super()
    this.maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH
  }

  static of<T>(elementCoder: Coder<T>, options?: LengthPrefixedCoderOptions): ListCoder<T> {
    return new ListCoder(elementCoder, options)
  }

  getElementCoder(): Coder<T> {
    return this.elementCoder
  }

  encode(value: T[], sink: ByteSink): void {
    if (!Array.isArray(value)) {
      throw new EncodingError(`${this.toString()} cannot encode a non-array value`, {
        code: "unsupported_value",
        context: { coder: this.toString(), type: typeof value },
      })
    }

    writeLength(sink, value.length, this.maxLength, this.toString())
    for (const element of value) {
      this.elementCoder.encodeNested(element, sink)
    }
  }

  decode(source: ByteSource): T[] {
    const count = readLength(source, this.maxLength)
    const out: T[] = []

    for (let i = 0; i < count; i++) {
      out.push(this.elementCoder.decodeNested(source))
    }

    return out
  }

  override getCoderArguments(): readonly Coder<unknown>[] {
    return [this.elementCoder]
  }

  override verifyDeterminism(): void {
    verifyComponentsDeterministic(this, "the element coder must be deterministic", [
      this.elementCoder,
    ])
  }
}
