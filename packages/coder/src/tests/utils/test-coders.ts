import { CustomCoder } from "../../core/custom-coder"
import { SelfDelimitingCoder } from "../../core/self-delimiting-coder"
import { readVarInt, writeVarInt } from "../../core/varint"
import type { ByteSink } from "../../ports/byte-sink"
import type { ByteSource } from "../../ports/byte-source"
import { Context } from "../../ports/context"

function writeInt32(value: number, sink: ByteSink): void {
  const bytes = new Uint8Array(4)
  new DataView(bytes.buffer).setInt32(0, value)
  sink.write(bytes)
}

function readInt32(source: ByteSource): number {
  const bytes = source.read(4)
  return new DataView(bytes.buffer, bytes.byteOffset, 4).getInt32(0)
}

/**
 * Implements only encode/decode on the bare bridge.
 */
export class Int32Coder extends CustomCoder<number> {
  encode(value: number, sink: ByteSink): void {
    writeInt32(value, sink)
  }

  decode(source: ByteSource): number {
    return readInt32(source)
  }
}

/**
 * Implements only encode/decode on the self-delimiting base.
 */
export class SelfDelimitingInt32Coder extends SelfDelimitingCoder<number> {
  encode(value: number, sink: ByteSink): void {
    writeInt32(value, sink)
  }

  decode(source: ByteSource): number {
    return readInt32(source)
  }
}

export type Point = { x: number; y: number }

/**
 * Deterministic in practice but never says so.
 */
export class PointCoder extends SelfDelimitingCoder<Point> {
  encode(value: Point, sink: ByteSink): void {
    writeInt32(value.x, sink)
    writeInt32(value.y, sink)
  }

  decode(source: ByteSource): Point {
    return { x: readInt32(source), y: readInt32(source) }
  }
}

const utf8 = new TextEncoder()
const fromUtf8 = new TextDecoder()

/**
 * Written against the context-explicit API: the length prefix is only
 * written in the nested context.
 */
export class LegacyStringCoder extends CustomCoder<string> {
  encode(value: string, sink: ByteSink): void {
    this.encodeWithContext(value, sink, Context.NESTED)
  }

  decode(source: ByteSource): string {
    return this.decodeWithContext(source, Context.NESTED)
  }

  override encodeWithContext(value: string, sink: ByteSink, context: Context): void {
    const bytes = utf8.encode(value)
    if (context === Context.NESTED) writeVarInt(sink, bytes.length)
    sink.write(bytes)
  }

  override decodeWithContext(source: ByteSource, context: Context): string {
    const bytes = context === Context.NESTED ? source.read(readVarInt(source)) : source.readAll()
    return fromUtf8.decode(bytes)
  }

  override verifyDeterminism(): void {}
}
