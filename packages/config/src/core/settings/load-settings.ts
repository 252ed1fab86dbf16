import { type ZodType, z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import type { ISettings } from "../../ports/settings"
import type { ValueSource } from "../../ports/value-source"
import { ResolverError } from "../errors/resolver-error"
import { Settings } from "./settings"
import { SETTINGS_PREFIX } from "./settings-schema"

export type LoadSettingsOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Later sources override earlier ones. Defaults to `ENVDOC_*` from `process.env`. */
  sources?: readonly ValueSource[]
}

/**
 * Merge the sources, validate the result and keep which source supplied
 * each key.
 *
 * @throws ResolverError (`invalid_settings`) when validation fails.
 */
export function loadSettings<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadSettingsOptions<T>): ISettings<T> {
  const merged: Record<string, string> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource({ prefix: SETTINGS_PREFIX })]

  for (const source of resolvedSources) {
    for (const [key, value] of Object.entries(source.load())) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ResolverError(`Settings validation failed:\n${z.prettifyError(result.error)}`, {
      code: "invalid_settings",
      context: { sources: resolvedSources.map((source) => source.name) },
      cause: result.error,
    })
  }

  return new Settings<T>(result.data, provenance, new Set(Object.keys(merged)))
}
