export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels.
 *
 * These values define the ordering of log levels for comparison
 * and filtering (higher = more severe).
 */
export const LogLevels = {
  /** Finest-grained diagnostic information. */
  Trace: 10,
  /** Details useful while investigating how a document was resolved. */
  Debug: 20,
  /** High-level informational messages about normal operation. */
  Info: 30,
  /** A configuration value was present but unusable. */
  Warn: 40,
  /** The configuration document (or a source) could not be used at all. */
  Error: 50,
  /** Severe errors after which the process may be unable to continue. */
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export function isLogLevelName(value: unknown): value is LogLevelName {
  return logLevelNames.some((name) => name === value)
}
