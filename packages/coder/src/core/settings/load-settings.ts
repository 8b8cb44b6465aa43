import { BaseError } from "@coderkit/errors"
import { z } from "zod"
import { EnvSettingsSource } from "../../adapters/settings/env-settings-source"
import type { SettingsSource } from "../../ports/settings-source"
import { CoderSettings } from "./coder-settings"
import { settingsSchema } from "./schema"

export type LoadCoderSettingsOptions = {
  /** Applied in order, later sources override earlier ones. Default: env with prefix `CODERKIT_`. */
  sources?: readonly SettingsSource[]
}

type Overlay = {
  values: Record<string, unknown>
  /** Key to the name of the last source that set it */
  origin: Map<string, string>
}

async function overlay(sources: readonly SettingsSource[]): Promise<Overlay> {
  const loaded = await Promise.all(
    sources.map(async (source) => [source.name, await source.load()] as const),
  )
  const result: Overlay = { values: {}, origin: new Map() }

  for (const [name, values] of loaded) {
    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      result.values[key] = value
      result.origin.set(key, name)
    }
  }

  return result
}

/**
 * Load, overlay and validate coder settings.
 *
 * @throws BaseError with code `invalid_settings`; its context names the
 * sources consulted and the keys that failed
 */
export async function loadCoderSettings({
  sources = [new EnvSettingsSource()],
}: LoadCoderSettingsOptions = {}): Promise<CoderSettings> {
  const { values, origin } = await overlay(sources)
  const parsed = settingsSchema.safeParse(values)

  if (!parsed.success) {
    throw new BaseError(`Coder settings validation failed:\n${z.prettifyError(parsed.error)}`, {
      code: "invalid_settings",
      context: {
        sources: sources.map((s) => s.name),
        keys: parsed.error.issues.map((issue) => issue.path.map(String).join(".")),
      },
    })
  }

  const provenance = Object.fromEntries(
    Object.keys(parsed.data).map((key) => [key, origin.get(key) ?? "default"]),
  )

  return new CoderSettings(parsed.data, provenance, new Set(origin.keys()))
}
