import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define policy, not behavior. Adapters must honor them but
 * are free to choose how.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. Entries below this level are ignored.
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development instead of JSON lines.
   */
  prettify?: boolean
}
