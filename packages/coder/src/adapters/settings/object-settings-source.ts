import type { SettingsSource } from "../../ports/settings-source"

export class ObjectSettingsSource implements SettingsSource {
  readonly name: string

  constructor(
    private readonly obj: Record<string, unknown>,
    name: string = "overrides",
  ) {
    this.name = `object:${name}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
