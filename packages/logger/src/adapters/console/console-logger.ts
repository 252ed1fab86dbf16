import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { type LogLevelName, LogLevels } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type ConsoleWriter = Pick<Console, "debug" | "info" | "warn" | "error">

export type ConsoleLoggerDeps = {
  console?: ConsoleWriter
}

export type ConsoleLoggerOptions = Partial<LoggerOptions> & {
  /**
   * Send every level to `console.error` so diagnostics stay on stderr and
   * never interleave with the embedding program's stdout.
   *
   * @default true
   */
  stderrOnly?: boolean
}

type ConsoleMethod = keyof ConsoleWriter

const LEVEL_TO_CONSOLE_METHOD: Record<LogLevelName, ConsoleMethod> = {
  trace: "debug",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
  fatal: "error",
}

const LEVEL_SEVERITY: Record<LogLevelName, number> = {
  trace: LogLevels.Trace,
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
  fatal: LogLevels.Fatal,
}

const RESERVED_KEYS = ["timestamp", "level", "message"] as const

export class ConsoleLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly sink: ConsoleWriter
  private readonly context: Record<string, unknown>

  constructor(
    private readonly deps: ConsoleLoggerDeps = {},
    private readonly opts: ConsoleLoggerOptions = {},
    context: LogContextPatch = {},
  ) {
    this.sink = deps.console ?? globalThis.console
    this.context = stripUndefined(context)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new ConsoleLogger<TContext & U>(this.deps, this.opts, {
      ...this.context,
      ...stripUndefined(context),
    })
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  private shouldLog(level: LogLevelName): boolean {
    const min = this.opts.level ?? "info"

    return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[min]
  }

  private methodFor(level: LogLevelName): ConsoleMethod {
    return (this.opts.stderrOnly ?? true) ? "error" : LEVEL_TO_CONSOLE_METHOD[level]
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>) {
    if (!this.shouldLog(level)) return

    const safeMeta = meta ? stripUndefined(meta) : {}
    for (const key of RESERVED_KEYS) delete safeMeta[key]

    const payload: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...safeMeta,
    }

    if ("err" in payload) {
      payload.err = normalizeError(payload.err)
    }

    const output = this.opts.prettify ? formatPretty(payload) : safeStringify(payload)

    this.sink[this.methodFor(level)](output)
  }
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return "toJSON" in value && typeof value.toJSON === "function"
}

function normalizeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err
  if (hasToJSON(err)) return err.toJSON()

  return {
    name: err.name,
    message: err.message,
    stack: err.stack,
    cause: normalizeError(err.cause),
  }
}

function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }
  return out
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v,
    )
  } catch {
    return JSON.stringify({ message: "Failed to stringify log payload" })
  }
}

function formatPretty(payload: Record<string, unknown>): string {
  const { timestamp, level, message, ...rest } = payload

  const head = [
    typeof timestamp === "string" ? timestamp : new Date().toISOString(),
    typeof level === "string" ? level.toUpperCase() : "INFO",
    typeof message === "string" ? message : "",
  ].join(" ")

  const tail = Object.keys(rest).length ? ` ${safeStringify(rest)}` : ""

  return `${head}${tail}`
}

export function createConsoleLogger<TContext extends LogContext = LogContext>(
  deps: ConsoleLoggerDeps = {},
  opts: ConsoleLoggerOptions = {},
): Logger<TContext> {
  return new ConsoleLogger<TContext>(deps, opts)
}
