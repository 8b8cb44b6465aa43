import { SelfDelimitingCoder } from "../../core/self-delimiting-coder"
import { assertInt32 } from "../../core/varint"
import type { ByteSink } from "../../ports/byte-sink"
import type { ByteSource } from "../../ports/byte-source"

/**
 * Signed 32-bit integers as 4 big-endian bytes, in both contexts.
 */
export class BigEndianIntegerCoder extends SelfDelimitingCoder<number> {
  private static readonly INSTANCE = new BigEndianIntegerCoder()

  static of(): BigEndianIntegerCoder {
    return BigEndianIntegerCoder.INSTANCE
  }

  encode(value: number, sink: ByteSink): void {
    assertInt32(value, this.toString())

    const bytes = new Uint8Array(4)
    new DataView(bytes.buffer).setInt32(0, value, false)

    sink.write(bytes)
  }

  decode(source: ByteSource): number {
    const bytes = source.read(4)

    return new DataView(bytes.buffer, bytes.byteOffset, 4).getInt32(0, false)
  }

  /** Fixed width, fixed byte order. */
  override verifyDeterminism(): void {}

  override consistentWithEquals(): boolean {
    return true
  }

  /** `-0` encodes as `0`, so both map to the same key. */
  override structuralValue(value: number): number {
    return value === 0 ? 0 : value
  }
}
