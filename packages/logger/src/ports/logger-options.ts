import type { LogLevelName } from "./log-level"

/**
 * Policy for a Logger instance. Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Leave off where logs are ingested
   * as JSON.
   */
  prettify?: boolean

  /** Bound to every entry as `service` */
  service?: string
}
