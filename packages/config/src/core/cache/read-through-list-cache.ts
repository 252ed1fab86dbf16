/**
 * Read-through capability. On a miss, `loader` computes the value; the
 * first value stored for a key is the one every later caller sees.
 */
export interface ReadThrough<T> {
  getThrough(key: string, loader: () => T): T
}

/** Lower-cases `A`-`Z` only; every other code unit is kept. */
export function asciiLowercase(value: string): string {
  return value.replace(/[A-Z]/g, (char) => String.fromCharCode(char.charCodeAt(0) + 32))
}

/**
 * Per-key cache of lower-cased string lists. Entries are never evicted and
 * callers always receive their own copy.
 */
export class ReadThroughListCache implements ReadThrough<string[]> {
  private readonly entries = new Map<string, readonly string[]>()

  get size(): number {
    return this.entries.size
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  getThrough(key: string, loader: () => readonly string[]): string[] {
    const cached = this.entries.get(key)
    if (cached) return [...cached]

    const computed = Object.freeze(loader().map(asciiLowercase))

    // first insert wins
    if (!this.entries.has(key)) this.entries.set(key, computed)

    return [...(this.entries.get(key) ?? computed)]
  }
}
