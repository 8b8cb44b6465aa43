import { SelfDelimitingCoder } from "../../core/self-delimiting-coder"
import { assertInt32, readVarInt, writeVarInt } from "../../core/varint"
import type { ByteSink } from "../../ports/byte-sink"
import type { ByteSource } from "../../ports/byte-source"

/**
 * Signed 32-bit integers as a VarInt of their two's-complement bits.
 * Small non-negative values take one byte; negative values take five.
 */
export class VarIntCoder extends SelfDelimitingCoder<number> {
  private static readonly INSTANCE = new VarIntCoder()

  static of(): VarIntCoder {
    return VarIntCoder.INSTANCE
  }

  encode(value: number, sink: ByteSink): void {
    assertInt32(value, this.toString())
    writeVarInt(sink, value)
  }

  decode(source: ByteSource): number {
    return readVarInt(source)
  }

  /** Minimal-length encoding; padded input is rejected on decode. */
  override verifyDeterminism(): void {}

  override consistentWithEquals(): boolean {
    return true
  }

  /** `-0` encodes as `0`, so both map to the same key. */
  override structuralValue(value: number): number {
    return value === 0 ? 0 : value
  }
}
