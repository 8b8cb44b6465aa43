import { logLevelNames } from "@coderkit/logger"
import { z } from "zod"
import { DEFAULT_MAX_LENGTH } from "../varint"

export const logFormats = ["json", "pretty", "silent"] as const

export type LogFormat = (typeof logFormats)[number]

export const settingsSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_FORMAT: z.enum(logFormats).default("json"),
  // lengths travel as 32-bit VarInts
  MAX_LENGTH: z.coerce
    .number()
    .int()
    .positive()
    .max(2 ** 31 - 1)
    .default(DEFAULT_MAX_LENGTH),
})

export type SettingsValues = z.infer<typeof settingsSchema>
