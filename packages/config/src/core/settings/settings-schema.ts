import { logLevelNames } from "@envdoc/logger"
import { z } from "zod"

export const SETTINGS_PREFIX = "ENVDOC_"

export const DEFAULT_VARIABLE = "MASK_CONFIG"

export const loggerKinds = ["console", "pino"] as const

export type LoggerKind = (typeof loggerKinds)[number]

/**
 * The resolver's own settings, read from `ENVDOC_*` variables.
 */
export const settingsSchema = z.object({
  /** Variable (and chunk prefix) holding the configuration document. */
  VARIABLE: z.string().min(1).default(DEFAULT_VARIABLE),
  LOG_LEVEL: z.enum(logLevelNames).default("warn"),
  LOG_PRETTY: z.stringbool().default(false),
  LOGGER: z.enum(loggerKinds).default("console"),
})

export type ResolverSettings = z.infer<typeof settingsSchema>

export const defaultSettings: ResolverSettings = settingsSchema.parse({})
