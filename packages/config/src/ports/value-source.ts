/**
 * An external source of named string values, analogous to environment
 * variables.
 *
 * A ValueSource only *supplies* raw text. It does not parse, merge or
 * validate; the document loader and the settings loader do that.
 */
export interface ValueSource {
  /**
   * Human-readable name for diagnostics and provenance.
   * Example: "env", "dotenv:.env.local", "object"
   */
  readonly name: string

  /**
   * Value for `name`, or `undefined` when the source does not define it.
   *
   * An empty string is a defined value.
   */
  read(name: string): string | undefined

  /**
   * Snapshot of every value the source defines.
   *
   * Returns a fresh object on each call.
   */
  load(): Record<string, string | undefined>
}
