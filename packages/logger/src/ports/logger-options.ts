import type { LogLevelName } from "./log-level"

/**
 * Policy for a Logger instance. Adapters decide how to honour it.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local development. Keep off in production,
   * where JSON lines are ingested by log processors.
   */
  prettify?: boolean
}
