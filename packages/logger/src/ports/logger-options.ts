import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit; anything below is dropped.
   */
  level: LogLevelName

  /**
   * Human-readable output for local development. Leave off in production,
   * where JSON lines are expected.
   */
  prettify?: boolean
}
