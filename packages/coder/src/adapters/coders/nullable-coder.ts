import type { Coder } from "../../core/coder"
import { verifyComponentsDeterministic } from "../../core/determinism"
import { DecodingError } from "../../core/errors"
import { CustomCoder } from "../../core/custom-coder"
import type { ByteSink } from "../../ports/byte-sink"
import type { ByteSource } from "../../ports/byte-source"

const ABSENT = 0
const PRESENT = 1

/**
 * `T | null` as a marker byte (0 absent, 1 present) followed by the value,
 * encoded in the same context as the whole.
 */
export class NullableCoder<T> extends CustomCoder<T | null> {
  constructor(private readonly valueCoder: Coder<T>) {
    super()
  }

  static of<T>(valueCoder: Coder<T>): NullableCoder<T> {
    return new NullableCoder(valueCoder)
  }

  getValueCoder(): Coder<T> {
    return this.valueCoder
  }

  encode(value: T | null, sink: ByteSink): void {
    if (value === null) {
      sink.writeByte(ABSENT)
      return
    }

    sink.writeByte(PRESENT)
    this.valueCoder.encodeNested(value, sink)
  }

  decode(source: ByteSource): T | null {
    return this.readMarker(source) ? this.valueCoder.decodeNested(source) : null
  }

  override encodeOuter(value: T | null, sink: ByteSink): void {
    if (value === null) {
      sink.writeByte(ABSENT)
      return
    }

    sink.writeByte(PRESENT)
    this.valueCoder.encodeOuter(value, sink)
  }

  override decodeOuter(source: ByteSource): T | null {
    return this.readMarker(source) ? this.valueCoder.decodeOuter(source) : null
  }

  override getCoderArguments(): readonly Coder<unknown>[] {
    return [this.valueCoder]
  }

  override verifyDeterminism(): void {
    verifyComponentsDeterministic(this, "the value coder must be deterministic", [
      this.valueCoder,
    ])
  }

  override consistentWithEquals(): boolean {
    return this.valueCoder.consistentWithEquals()
  }

  private readMarker(source: ByteSource): boolean {
    const marker = source.readByte()

    if (marker !== ABSENT && marker !== PRESENT) {
      throw new DecodingError(`${this.toString()} read invalid null marker ${marker}`, {
        context: { coder: this.toString(), marker },
      })
    }

    return marker === PRESENT
  }
}
