import type { ConfigDocument } from "../document/config-document"
import { isJsonArray } from "../json/json-value"
import { readScalar, type ScalarKind, type ScalarOf } from "../json/scalar"

export function getScalar<K extends ScalarKind>(
  doc: ConfigDocument,
  key: string,
  kind: K,
): ScalarOf<K> | undefined {
  return readScalar(doc.get(key), kind)
}

export function getString(doc: ConfigDocument, key: string): string | undefined {
  return getScalar(doc, key, "string")
}

/** Booleans only; `1`, `"true"` and other truthy values are not coerced. */
export function getBool(doc: ConfigDocument, key: string): boolean | undefined {
  return getScalar(doc, key, "bool")
}

export function checkBool(doc: ConfigDocument, key: string): boolean {
  return getBool(doc, key) ?? false
}

export function getUint32(doc: ConfigDocument, key: string): number | undefined {
  return getScalar(doc, key, "uint32")
}

export function getUint64(doc: ConfigDocument, key: string): bigint | undefined {
  return getScalar(doc, key, "uint64")
}

export function getInt32(doc: ConfigDocument, key: string): number | undefined {
  return getScalar(doc, key, "int32")
}

export function getInt64(doc: ConfigDocument, key: string): bigint | undefined {
  return getScalar(doc, key, "int64")
}

export function getDouble(doc: ConfigDocument, key: string): number | undefined {
  return getScalar(doc, key, "double")
}

/**
 * String elements of the array at `key`, in order. Other elements are
 * skipped; a missing or non-array value gives an empty list.
 */
export function getStringList(doc: ConfigDocument, key: string): string[] {
  const value = doc.get(key)
  if (!isJsonArray(value)) return []

  return value.filter((item): item is string => typeof item === "string")
}
