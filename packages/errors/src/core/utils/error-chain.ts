function getCause(v: unknown): unknown {
  if (typeof v !== "object" || v === null || !("cause" in v)) return undefined

  return v.cause
}

/**
 * Walk the error cause chain and return all values encountered, outermost first.
 *
 * Stops at `maxDepth` (default 50) or when a value repeats.
 *
 * @example
 * ```ts
 * catch (err) {
 *   for (const e of errorChain(err)) {
 *     logger.debug(e instanceof Error ? e.message : String(e))
 *   }
 * }
 * ```
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}

/**
 * Messages of every link in the cause chain, outermost first.
 */
export function errorMessages(err: unknown, maxDepth?: number): string[] {
  return errorChain(err, maxDepth).map((e) => (e instanceof Error ? e.message : String(e)))
}
