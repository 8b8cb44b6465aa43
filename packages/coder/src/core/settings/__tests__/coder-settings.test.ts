import { CoderSettings } from "../coder-settings"

describe("CoderSettings", () => {
  const data = { LOG_LEVEL: "debug", LOG_FORMAT: "json", MAX_LENGTH: 2048 } as const
  const provenance = { LOG_LEVEL: "env:CODERKIT_", LOG_FORMAT: "default", MAX_LENGTH: "object:cli" }
  const settings = new CoderSettings(
    { ...data },
    provenance,
    new Set(["LOG_LEVEL", "MAX_LENGTH", "MAX_LENGHT"]),
  )

  it("exposes the validated values", () => {
    expect(settings.value).toEqual(data)
  })

  it("explains where each key came from", () => {
    expect(settings.explain("LOG_LEVEL")).toBe("env:CODERKIT_")
    expect(settings.explain("LOG_FORMAT")).toBe("default")
    expect(settings.explain("MAX_LENGTH")).toBe("object:cli")
  })

  it("falls back to default for keys without provenance", () => {
    const bare = new CoderSettings({ ...data }, {}, new Set())

    expect(bare.explain("MAX_LENGTH")).toBe("default")
  })

  it("lists each source once", () => {
    expect(settings.sourcesUsed()).toEqual(["env:CODERKIT_", "default", "object:cli"])
  })

  it("reports supplied keys the schema does not know", () => {
    expect(settings.unknownKeys()).toEqual(["MAX_LENGHT"])
  })

  it("derives length-prefixed coder options", () => {
    expect(settings.coderOptions()).toEqual({ maxLength: 2048 })
  })

  it("freezes its values", () => {
    expect(Object.isFrozen(settings.value)).toBe(true)
  })
})
