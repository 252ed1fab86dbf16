import type { ValueSource } from "../../ports/value-source"

export type EnvSourceOptions = {
  /** Only names starting with the prefix are visible, with the prefix removed. */
  prefix?: string
  /** @default process.env */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ValueSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  read(name: string): string | undefined {
    const key = this.prefix + name

    return Object.hasOwn(this.env, key) ? this.env[key] : undefined
  }

  load(): Record<string, string | undefined> {
    if (!this.prefix) return { ...this.env }

    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return filtered
  }
}
