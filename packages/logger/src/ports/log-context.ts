/**
 * Fields a resolver diagnostic may carry.
 *
 * `variable` is the environment-style name a value was read from, `key` and
 * `domain` locate a value inside the configuration document.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  source: string
  variable: string
  chunks: number

  domain: string
  key: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
