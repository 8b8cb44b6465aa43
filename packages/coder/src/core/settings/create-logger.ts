import {
  createNullLogger,
  createPinoLogger,
  type Logger,
  type PinoLoggerDeps,
} from "@coderkit/logger"
import type { CoderSettings } from "./coder-settings"

export type CreateLoggerDeps = {
  /** Destination for the `json` format. Defaults to stdout. */
  destination?: PinoLoggerDeps["destination"]
}

/**
 * Build the logger selected by `LOG_FORMAT`: pino JSON lines (`json`),
 * pino through pino-pretty (`pretty`), or nothing at all (`silent`).
 */
export function createLoggerFromSettings(
  settings: CoderSettings,
  deps: CreateLoggerDeps = {},
): Logger {
  const level = settings.value.LOG_LEVEL

  switch (settings.value.LOG_FORMAT) {
    case "json":
      return createPinoLogger(
        deps.destination ? { destination: deps.destination } : {},
        { level, prettify: false },
      )
    case "pretty":
      return createPinoLogger({}, { level, prettify: true })
    case "silent":
      return createNullLogger()
  }
}
