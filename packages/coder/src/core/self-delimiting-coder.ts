import type { ByteSink } from "../ports/byte-sink"
import type { ByteSource } from "../ports/byte-source"
import { CustomCoder } from "./custom-coder"

/**
 * A custom coder whose outer format is its nested format.
 *
 * Subclasses implement `encode`/`decode` only and get both contexts.
 */
export abstract class SelfDelimitingCoder<T> extends CustomCoder<T> {
  override encodeOuter(value: T, sink: ByteSink): void {
    this.encode(value, sink)
  }

  override decodeOuter(source: ByteSource): T {
    return this.decode(source)
  }
}
