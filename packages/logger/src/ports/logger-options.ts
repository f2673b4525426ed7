import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local development.
   * Leave off in production so logs stay one JSON object per line.
   */
  prettify?: boolean
}
