import { createConsoleLogger, createPinoLogger, type Logger } from "@envdoc/logger"
import type { ResolverSettings } from "../settings/settings-schema"

export type LoggerSettings = Pick<ResolverSettings, "LOGGER" | "LOG_LEVEL" | "LOG_PRETTY">

/** Logger adapter selected by the resolver settings. */
export function createLogger(settings: LoggerSettings): Logger {
  const opts = { level: settings.LOG_LEVEL, prettify: settings.LOG_PRETTY }

  switch (settings.LOGGER) {
    case "pino":
      return createPinoLogger({}, opts, { service: "envdoc" })
    case "console":
      return createConsoleLogger({}, opts).child({ service: "envdoc" })
  }
}
