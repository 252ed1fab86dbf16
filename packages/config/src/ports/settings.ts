/**
 * Validated resolver settings with provenance.
 *
 * @typeParam T - The shape of the settings, inferred from a zod schema.
 *
 * @example
 * ```typescript
 * const settings = loadSettings({
 *   schema: settingsSchema,
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource({ prefix: "ENVDOC_" })],
 * })
 *
 * settings.get("VARIABLE")     // "MASK_CONFIG"
 * settings.explain("LOG_LEVEL") // "env" or "default"
 * ```
 */
export interface ISettings<T extends Record<string, unknown>> {
  /** Full validated settings object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that provided the final value for `key`, or
   * `"default"` when the schema default was used.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Keys present in the sources but unknown to the schema.
   *
   * Useful for spotting typos such as `ENVDOC_LOGLEVEL`.
   */
  unknownKeys(): string[]
}
