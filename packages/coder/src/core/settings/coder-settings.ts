import type { LengthPrefixedCoderOptions } from "../../adapters/coders/coder-options"
import type { SettingsValues } from "./schema"

/**
 * Validated coder settings with provenance.
 */
export class CoderSettings {
  constructor(
    private readonly data: Readonly<SettingsValues>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<SettingsValues> {
    return this.data
  }

  /**
   * Name of the source that supplied `key`, or "default" for schema defaults.
   */
  explain(key: keyof SettingsValues): string {
    return this.provenance[key] ?? "default"
  }

  /** Distinct source names that contributed a value, "default" included. */
  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  /** Keys supplied by a source that the schema does not know (typos, stale keys). */
  unknownKeys(): string[] {
    const known = new Set<string>(Object.keys(this.data))

    return [...this.providedKeys].filter((k) => !known.has(k))
  }

  /** Options for length-prefixed coders. */
  coderOptions(): LengthPrefixedCoderOptions {
    return { maxLength: this.data.MAX_LENGTH }
  }
}
