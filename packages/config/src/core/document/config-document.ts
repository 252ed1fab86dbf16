import { isJsonObject, type JsonObject, type JsonValue } from "../json/json-value"

export type DocumentStatus = "parsed" | "empty" | "invalid"

/**
 * Where a document came from.
 *
 * `variables` lists, in order, the variables whose text was concatenated.
 */
export type DocumentOrigin = Readonly<{
  status: DocumentStatus
  source: string
  variables: readonly string[]
}>

const EMPTY_ROOT: JsonObject = new Map()

/**
 * The immutable, parsed configuration tree. Its root is always an object.
 */
export class ConfigDocument {
  private constructor(
    readonly root: JsonObject,
    readonly origin: DocumentOrigin,
  ) {}

  static of(root: JsonObject, origin: DocumentOrigin): ConfigDocument {
    return new ConfigDocument(root, Object.freeze({ ...origin, variables: [...origin.variables] }))
  }

  static empty(origin: {
    source: string
    variables: readonly string[]
    status?: DocumentStatus
  }): ConfigDocument {
    return ConfigDocument.of(EMPTY_ROOT, { ...origin, status: origin.status ?? "empty" })
  }

  get size(): number {
    return this.root.size
  }

  has(key: string): boolean {
    return this.root.has(key)
  }

  get(key: string): JsonValue | undefined {
    return this.root.get(key)
  }

  /** Two-level lookup; any failed hop yields `undefined`. */
  getNested(domain: string, key: string): JsonValue | undefined {
    const inner = this.root.get(domain)

    return isJsonObject(inner) ? inner.get(key) : undefined
  }

  keys(): string[] {
    return [...this.root.keys()]
  }

  explain(): string {
    const { status, source, variables } = this.origin
    const from = variables.length ? `${variables.join(" + ")} (${source})` : source

    switch (status) {
      case "parsed":
        return `parsed ${this.size} keys from ${from}`
      case "invalid":
        return `invalid input from ${from}, using empty document`
      case "empty":
        return `no input in ${source}, using empty document`
    }
  }
}
