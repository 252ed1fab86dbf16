import { ResolverError } from "../errors/resolver-error"

export const INT32_MIN = -2_147_483_648n
export const INT32_MAX = 2_147_483_647n
export const UINT32_MAX = 4_294_967_295n
export const INT64_MIN = -9_223_372_036_854_775_808n
export const INT64_MAX = 9_223_372_036_854_775_807n
export const UINT64_MAX = 18_446_744_073_709_551_615n

/**
 * How a number was written in the document.
 *
 * - `int64`: integer literal that fits a signed 64-bit integer
 * - `uint64`: integer literal above the int64 range, up to 2^64-1
 * - `double`: literal with a fraction or an exponent
 */
export type NumberKind = "int64" | "uint64" | "double"

const INTEGER_LITERAL = /^-?\d+$/

/**
 * A JSON number that remembers its literal, so integers keep all 64 bits
 * and `1.0` stays distinguishable from `1`.
 */
export class JsonNumber {
  private constructor(
    readonly kind: NumberKind,
    readonly literal: string,
    private readonly integer: bigint | undefined,
  ) {}

  /**
   * @throws ResolverError (`number_out_of_range`) for an integer outside
   * `[-2^63, 2^64-1]` or a literal that is not finite as a double.
   */
  static fromLiteral(literal: string): JsonNumber {
    if (INTEGER_LITERAL.test(literal)) {
      const value = BigInt(literal)

      if (value >= INT64_MIN && value <= INT64_MAX) {
        return new JsonNumber("int64", literal, value)
      }
      if (value > INT64_MAX && value <= UINT64_MAX) {
        return new JsonNumber("uint64", literal, value)
      }

      throw outOfRange(literal)
    }

    if (!Number.isFinite(Number(literal))) throw outOfRange(literal)

    return new JsonNumber("double", literal, undefined)
  }

  get isInteger(): boolean {
    return this.integer !== undefined
  }

  /** The exact integer value, or `undefined` for a `double` literal. */
  toBigInt(): bigint | undefined {
    return this.integer
  }

  /** Numeric value as a double; integers are widened. */
  toDouble(): number {
    return Number(this.literal)
  }

  toJSON(): number | string {
    return this.kind === "double" ? this.toDouble() : this.literal
  }
}

function outOfRange(literal: string): ResolverError {
  return new ResolverError(`Number ${literal} cannot be represented`, {
    code: "number_out_of_range",
    context: { literal },
  })
}

export type JsonArray = readonly JsonValue[]

/** Objects are maps; `__proto__` and `constructor` are ordinary keys. */
export type JsonObject = ReadonlyMap<string, JsonValue>

export type JsonValue = null | boolean | string | JsonNumber | JsonArray | JsonObject

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value instanceof Map
}

export function isJsonArray(value: JsonValue | undefined): value is JsonArray {
  return Array.isArray(value)
}

export function isJsonNumber(value: JsonValue | undefined): value is JsonNumber {
  return value instanceof JsonNumber
}
