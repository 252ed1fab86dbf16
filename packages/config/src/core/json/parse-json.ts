import { ResolverError } from "../errors/resolver-error"
import { JsonNumber, type JsonObject, type JsonValue } from "./json-value"

/**
 * Parse JSON text into a {@link JsonValue} tree.
 *
 * Numbers go through {@link JsonNumber.fromLiteral}, so 64-bit integers
 * survive unchanged. When a key repeats inside one object the first value
 * is kept. Every key, `__proto__` included, is an ordinary entry.
 *
 * @throws ResolverError (`invalid_json` or `number_out_of_range`)
 */
export function parseJson(text: string): JsonValue {
  try {
    JSON.parse(text)
  } catch (err) {
    throw new ResolverError("Text is not valid JSON", {
      code: "invalid_json",
      context: { length: text.length },
      cause: err,
    })
  }

  return new JsonReader(text).read()
}

const WHITESPACE = " \t\n\r"
const NUMBER_CHARS = "+-0123456789.eE"

/**
 * Builds the tree from text that `JSON.parse` has already accepted, so it
 * only tracks positions and never reports syntax errors itself.
 */
class JsonReader {
  private pos = 0

  constructor(private readonly text: string) {}

  read(): JsonValue {
    return this.value()
  }

  private peek(): string {
    return this.text.charAt(this.pos)
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && WHITESPACE.includes(this.peek())) this.pos++
  }

  private value(): JsonValue {
    this.skipWhitespace()

    switch (this.peek()) {
      case "{":
        return this.object()
      case "[":
        return this.array()
      case '"':
        return this.string()
      case "t":
        this.pos += 4
        return true
      case "f":
        this.pos += 5
        return false
      case "n":
        this.pos += 4
        return null
      default:
        return this.number()
    }
  }

  private object(): JsonObject {
    const entries = new Map<string, JsonValue>()

    this.pos++
    this.skipWhitespace()

    if (this.peek() === "}") {
      this.pos++
      return entries
    }

    while (this.pos < this.text.length) {
      this.skipWhitespace()
      const key = this.string()
      this.skipWhitespace()
      this.pos++ // ':'
      const value = this.value()

      // first occurrence wins
      if (!entries.has(key)) entries.set(key, value)

      this.skipWhitespace()
      if (this.text.charAt(this.pos++) === "}") break
    }

    return entries
  }

  private array(): readonly JsonValue[] {
    const items: JsonValue[] = []

    this.pos++
    this.skipWhitespace()

    if (this.peek() === "]") {
      this.pos++
      return Object.freeze(items)
    }

    while (this.pos < this.text.length) {
      items.push(this.value())

      this.skipWhitespace()
      if (this.text.charAt(this.pos++) === "]") break
    }

    return Object.freeze(items)
  }

  private string(): string {
    const start = this.pos

    this.pos++
    while (this.pos < this.text.length && this.peek() !== '"') {
      this.pos += this.peek() === "\\" ? 2 : 1
    }
    this.pos++

    const decoded: string = JSON.parse(this.text.slice(start, this.pos))

    return decoded
  }

  private number(): JsonNumber {
    const start = this.pos

    while (this.pos < this.text.length && NUMBER_CHARS.includes(this.peek())) this.pos++

    return JsonNumber.fromLiteral(this.text.slice(start, this.pos))
  }
}
