import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Leave off in clusters, where
   * JSON lines are collected.
   */
  prettify?: boolean
}
