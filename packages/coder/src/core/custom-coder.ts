import type { ByteSink } from "../ports/byte-sink"
import type { ByteSource } from "../ports/byte-source"
import { Context } from "../ports/context"
import { Coder } from "./coder"
import { NondeterminismError } from "./errors"

/**
 * Base class for coders whose byte logic lives in a hand-written
 * `encode`/`decode` pair, bridging the context-explicit API
 * (`encodeWithContext`/`decodeWithContext`) and the one-method-per-context API.
 *
 * Dispatch:
 *
 * | entry point                       | goes to                             |
 * | --------------------------------- | ----------------------------------- |
 * | `encodeNested`                    | `encode` (the `Coder` default)      |
 * | `encodeOuter`                     | `encodeWithContext(…, OUTER)`       |
 * | `encodeWithContext(…, NESTED)`    | `encodeNested`                      |
 * | `encodeWithContext(…, OUTER)`     | `encodeOuter`                       |
 *
 * and the same for decode. The nested path reaches `encode` without passing
 * through `encodeWithContext`.
 *
 * @remarks
 * The default `encodeOuter` and the default `encodeWithContext(…, OUTER)` call
 * each other. A subclass that overrides neither recurses until the stack is
 * exhausted (`RangeError`) when used through the outer path. Subclasses either
 * override `encodeOuter`/`decodeOuter` (see `SelfDelimitingCoder` for the
 * common case where the outer format equals the nested one) or override the
 * context-explicit pair, which then intercepts both contexts.
 *
 * `verifyDeterminism()` fails until a subclass overrides it.
 */
export abstract class CustomCoder<T> extends Coder<T> {
  override encodeOuter(value: T, sink: ByteSink): void {
    this.encodeWithContext(value, sink, Context.OUTER)
  }

  /**
   * @deprecated Override `encode` and, where the outer format differs,
   * `encodeOuter` instead.
   */
  encodeWithContext(value: T, sink: ByteSink, context: Context): void {
    if (context === Context.NESTED) {
      this.encodeNested(value, sink)
    } else {
      this.encodeOuter(value, sink)
    }
  }

  override decodeOuter(source: ByteSource): T {
    return this.decodeWithContext(source, Context.OUTER)
  }

  /**
   * @deprecated Override `decode` and, where the outer format differs,
   * `decodeOuter` instead.
   */
  decodeWithContext(source: ByteSource, context: Context): T {
    if (context === Context.NESTED) {
      return this.decodeNested(source)
    }

    return this.decodeOuter(source)
  }

  /**
   * Empty: a custom coder has no component coders unless a subclass says so.
   */
  override getCoderArguments(): readonly Coder<unknown>[] {
    return []
  }

  /**
   * @throws NondeterminismError always; a custom coder is presumed
   * non-deterministic until a subclass proves otherwise.
   */
  override verifyDeterminism(): void {
    throw new NondeterminismError(
      this,
      "must override verifyDeterminism, or is presumed non-deterministic.",
    )
  }
}
