import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Adapters (console, pino)
 * must honor them but are free to implement them as they see fit.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. Entries below this level are dropped.
   */
  level: LogLevelName

  /**
   * Render human-readable lines instead of one JSON object per line.
   */
  prettify?: boolean
}
