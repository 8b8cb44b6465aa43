import { BufferSink } from "../adapters/memory/buffer-sink"
import type { ByteSink } from "../ports/byte-sink"
import type { ByteSource } from "../ports/byte-source"

/**
 * Encodes values of type `T` to bytes and back.
 *
 * Subclasses must supply `encode`/`decode`, which must round-trip:
 * `decode(encode(v))` equals `v` for every value the coder accepts.
 *
 * The context-specific entry points (`encodeNested`, `encodeOuter`, and their
 * decode counterparts) are what the composition graph calls: the nested pair
 * for a component inside a larger encoding, the outer pair when the coder owns
 * the whole stream. Both default to the two-argument methods here.
 *
 * Coders hold no mutable state and may be shared freely; a sink or source
 * belongs to one call at a time.
 */
export abstract class Coder<T> {
  /**
   * Write `value` as a self-delimiting byte sequence.
   *
   * @throws EncodingError when the value cannot be represented
   * @throws IOFailure when the sink rejects bytes
   */
  abstract encode(value: T, sink: ByteSink): void

  /**
   * Read one value written by {@link Coder.encode}.
   *
   * @throws DecodingError when the bytes are not a valid encoding
   * @throws IOFailure when the source fails or ends early
   */
  abstract decode(source: ByteSource): T

  encodeNested(value: T, sink: ByteSink): void {
    this.encode(value, sink)
  }

  decodeNested(source: ByteSource): T {
    return this.decode(source)
  }

  encodeOuter(value: T, sink: ByteSink): void {
    this.encode(value, sink)
  }

  decodeOuter(source: ByteSource): T {
    return this.decode(source)
  }

  /**
   * Component coders this coder is built from, in order
   * (e.g. the element coder of a list coder).
   */
  abstract getCoderArguments(): readonly Coder<unknown>[]

  /**
   * Returns normally only when equal values always encode to identical bytes.
   *
   * @throws NondeterminismError otherwise
   */
  abstract verifyDeterminism(): void

  /**
   * Whether two values are `===` exactly when their encodings are.
   */
  consistentWithEquals(): boolean {
    return false
  }

  /**
   * A value usable as a Map/Set key standing in for `value`: the value itself
   * when the coder is consistent with equals, else the hex of its outer encoding.
   */
  structuralValue(value: T): unknown {
    if (this.consistentWithEquals()) return value

    const sink = new BufferSink()
    this.encodeOuter(value, sink)

    return Buffer.from(sink.toBytes()).toString("hex")
  }

  toString(): string {
    const args = this.getCoderArguments()
    const name = this.constructor.name

    return args.length ? `${name}(${args.map(String).join(", ")})` : name
  }
}
