import { EnvSource } from "../adapters/env/env-source"
import type { ISettings } from "../ports/settings"
import { createLogger } from "./logging/create-logger"
import { type ConfigResolver, createConfigResolver } from "./resolver"
import { loadSettings } from "./settings/load-settings"
import {
  defaultSettings,
  type ResolverSettings,
  SETTINGS_PREFIX,
  settingsSchema,
} from "./settings/settings-schema"

let instance: ConfigResolver | undefined

/**
 * The process-wide resolver, created on first call from `process.env`.
 */
export function configResolver(): ConfigResolver {
  instance ??= bootstrap(process.env)

  return instance
}

/**
 * Build a resolver from an environment: `ENVDOC_*` settings first, then the
 * document under the configured variable. Never throws.
 */
export function bootstrap(env: Record<string, string | undefined>): ConfigResolver {
  let settings: ISettings<ResolverSettings> | undefined
  let failure: unknown

  try {
    settings = loadSettings({
      schema: settingsSchema,
      sources: [new EnvSource({ env, prefix: SETTINGS_PREFIX })],
    })
  } catch (err) {
    failure = err
  }

  const value = settings?.value ?? defaultSettings
  const logger = createLogger(value)

  if (!settings) {
    logger.error("Invalid resolver settings, using defaults", { err: failure })
  } else {
    const unknownKeys = settings.unknownKeys()

    if (unknownKeys.length) {
      logger.warn(`Ignoring unknown ${SETTINGS_PREFIX}* settings`, {
        keys: unknownKeys.map((key) => SETTINGS_PREFIX + key),
      })
    }
  }

  return createConfigResolver({
    variable: value.VARIABLE,
    source: new EnvSource({ env }),
    logger,
  })
}
