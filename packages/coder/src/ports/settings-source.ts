/**
 * A source of raw coder settings.
 *
 * A source only loads values; validation, coercion and merging happen in
 * `loadCoderSettings`. Sources are applied in order, later ones win.
 */
export interface SettingsSource {
  /**
   * Human-readable name for provenance, e.g. "env:CODERKIT_" or "object:overrides".
   */
  readonly name: string

  /**
   * Load values. A key mapped to `undefined` counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}
