import {
  INT32_MAX,
  INT32_MIN,
  INT64_MAX,
  INT64_MIN,
  isJsonNumber,
  type JsonValue,
  UINT32_MAX,
  UINT64_MAX,
} from "./json-value"

/**
 * The closed set of scalar kinds a caller can request, and the TypeScript
 * type each one produces. 64-bit kinds produce `bigint`.
 */
export type ScalarKindMap = {
  bool: boolean
  int32: number
  int64: bigint
  uint32: number
  uint64: bigint
  float: number
  double: number
  string: string
}

export type ScalarKind = keyof ScalarKindMap

export type ScalarOf<K extends ScalarKind> = ScalarKindMap[K]

type ScalarReaders = {
  [K in ScalarKind]: (value: JsonValue) => ScalarKindMap[K] | undefined
}

/** Signed integer kind only; `1.0` and unsigned-only values are rejected. */
export function readSigned(value: JsonValue, min: bigint, max: bigint): bigint | undefined {
  if (!isJsonNumber(value) || value.kind !== "int64") return undefined

  const integer = value.toBigInt()
  if (integer === undefined || integer < min || integer > max) return undefined

  return integer
}

/** Unsigned integer kind, or a signed integer that is not negative. */
export function readUnsigned(value: JsonValue, max: bigint): bigint | undefined {
  if (!isJsonNumber(value) || !value.isInteger) return undefined

  const integer = value.toBigInt()
  if (integer === undefined || integer < 0n || integer > max) return undefined

  return integer
}

/** Any number kind; integers are widened. */
export function readDouble(value: JsonValue): number | undefined {
  return isJsonNumber(value) ? value.toDouble() : undefined
}

function toNumber(value: bigint | undefined): number | undefined {
  return value === undefined ? undefined : Number(value)
}

const SCALAR_READERS: ScalarReaders = {
  bool: (value) => (typeof value === "boolean" ? value : undefined),
  string: (value) => (typeof value === "string" ? value : undefined),
  int32: (value) => toNumber(readSigned(value, INT32_MIN, INT32_MAX)),
  int64: (value) => readSigned(value, INT64_MIN, INT64_MAX),
  uint32: (value) => toNumber(readUnsigned(value, UINT32_MAX)),
  uint64: (value) => readUnsigned(value, UINT64_MAX),
  float: (value) => {
    const double = readDouble(value)
    return double === undefined ? undefined : Math.fround(double)
  },
  double: (value) => readDouble(value),
}

export function isScalarKind(kind: string): kind is ScalarKind {
  return Object.hasOwn(SCALAR_READERS, kind)
}

/**
 * Convert a document value to the requested scalar kind.
 *
 * Returns `undefined` when the value is missing, of the wrong kind, out of
 * range for the kind, or when `kind` is not one of the supported kinds.
 */
export function readScalar<K extends ScalarKind>(
  value: JsonValue | undefined,
  kind: K,
): ScalarOf<K> | undefined {
  if (value === undefined || !Object.hasOwn(SCALAR_READERS, kind)) return undefined

  return SCALAR_READERS[kind](value)
}
