import type { Coder } from "./coder"
import { NondeterminismError } from "./errors"

/**
 * Verify each component coder and fail for `target` if any is non-deterministic.
 *
 * Every failing component contributes its message as a reason; the first
 * failure becomes the cause. Errors other than `NondeterminismError` propagate.
 *
 * @example
 * ```ts
 * verifyDeterminism(): void {
 *   verifyComponentsDeterministic(this, "element coder must be deterministic", [this.elementCoder])
 * }
 * ```
 */
export function verifyComponentsDeterministic(
  target: Coder<unknown>,
  message: string,
  components: readonly Coder<unknown>[],
): void {
  const failures: NondeterminismError[] = []

  for (const component of components) {
    try {
      component.verifyDeterminism()
    } catch (err) {
      if (!(err instanceof NondeterminismError)) throw err
      failures.push(err)
    }
  }

  const [first] = failures
  if (first === undefined) return

  throw new NondeterminismError(target, [message, ...failures.map((f) => f.message)], {
    cause: first,
  })
}
