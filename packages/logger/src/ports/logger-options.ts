import type { LogLevelName } from "./log-level"

/**
 * Logging policy. Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local debugging; leave off where logs are
   * ingested as JSON.
   */
  prettify?: boolean
}
