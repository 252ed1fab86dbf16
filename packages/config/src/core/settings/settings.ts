import type { ISettings } from "../../ports/settings"

export class Settings<T extends Record<string, unknown>> implements ISettings<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  unknownKeys(): string[] {
    return [...this.mergedKeys].filter((key) => !Object.hasOwn(this.data, key))
  }
}
