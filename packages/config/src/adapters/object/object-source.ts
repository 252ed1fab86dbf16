import type { ValueSource } from "../../ports/value-source"

/** In-memory values, for embedders and tests. */
export class ObjectSource implements ValueSource {
  private readonly values: Readonly<Record<string, string | undefined>>

  constructor(
    values: Record<string, string | undefined>,
    readonly name = "object",
  ) {
    this.values = Object.freeze({ ...values })
  }

  read(name: string): string | undefined {
    return Object.hasOwn(this.values, name) ? this.values[name] : undefined
  }

  load(): Record<string, string | undefined> {
    return { ...this.values }
  }
}
