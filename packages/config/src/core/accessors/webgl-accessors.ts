import type { ConfigDocument } from "../document/config-document"
import {
  INT32_MAX,
  INT32_MIN,
  isJsonArray,
  isJsonNumber,
  isJsonObject,
  type JsonValue,
} from "../json/json-value"
import { readScalar, readSigned, type ScalarKind, type ScalarOf } from "../json/scalar"

export type WebGlOptions = {
  /** Read the WebGL2 domain instead of the WebGL1 one. */
  webgl2?: boolean
}

export const WebGlDomains = {
  contextAttributes: { webgl1: "webGl:contextAttributes", webgl2: "webGl2:contextAttributes" },
  parameters: { webgl1: "webGl:parameters", webgl2: "webGl2:parameters" },
  shaderPrecisionFormats: {
    webgl1: "webGl:shaderPrecisionFormats",
    webgl2: "webGl2:shaderPrecisionFormats",
  },
} as const

type WebGlDomain = keyof typeof WebGlDomains

function domainOf(domain: WebGlDomain, opts: WebGlOptions): string {
  return opts.webgl2 ? WebGlDomains[domain].webgl2 : WebGlDomains[domain].webgl1
}

function lookup(
  doc: ConfigDocument,
  domain: WebGlDomain,
  key: string,
  opts: WebGlOptions,
): JsonValue | undefined {
  return doc.getNested(domainOf(domain, opts), key)
}

export function getContextAttribute<K extends ScalarKind>(
  doc: ConfigDocument,
  name: string,
  kind: K,
  opts: WebGlOptions = {},
): ScalarOf<K> | undefined {
  return readScalar(lookup(doc, "contextAttributes", name, opts), kind)
}

export type GlParameterValue =
  | { kind: "null" }
  | { kind: "string"; value: string }
  | { kind: "double"; value: number }
  | { kind: "int64"; value: bigint }
  | { kind: "bool"; value: boolean }

type GlParameterMatcher = (value: JsonValue) => GlParameterValue | undefined

/**
 * Tried in order; the first match wins. Every number matches `double`, so
 * integer parameters come back as doubles.
 */
const GL_PARAMETER_MATCHERS: readonly GlParameterMatcher[] = [
  (value) => (value === null ? { kind: "null" } : undefined),
  (value) => (typeof value === "string" ? { kind: "string", value } : undefined),
  (value) => (isJsonNumber(value) ? { kind: "double", value: value.toDouble() } : undefined),
  (value) => {
    const integer = readScalar(value, "int64")
    return integer === undefined ? undefined : { kind: "int64", value: integer }
  },
  (value) => (typeof value === "boolean" ? { kind: "bool", value } : undefined),
]

export function getGlParameter(
  doc: ConfigDocument,
  pname: number,
  opts: WebGlOptions = {},
): GlParameterValue | undefined {
  const value = lookup(doc, "parameters", String(pname), opts)
  if (value === undefined) return undefined

  for (const match of GL_PARAMETER_MATCHERS) {
    const result = match(value)
    if (result) return result
  }

  return undefined
}

export function getGlParameterOr<K extends ScalarKind>(
  doc: ConfigDocument,
  pname: number,
  kind: K,
  fallback: ScalarOf<K>,
  opts: WebGlOptions = {},
): ScalarOf<K> {
  return readScalar(lookup(doc, "parameters", String(pname), opts), kind) ?? fallback
}

/**
 * Every element of the parameter array converted to `kind`, or `fallback`
 * when the value is not an array or any element fails.
 */
export function getGlParameterVector<K extends ScalarKind>(
  doc: ConfigDocument,
  pname: number,
  kind: K,
  fallback: readonly ScalarOf<K>[],
  opts: WebGlOptions = {},
): ScalarOf<K>[] {
  const value = lookup(doc, "parameters", String(pname), opts)
  if (!isJsonArray(value)) return [...fallback]

  const out: ScalarOf<K>[] = []

  for (const item of value) {
    const converted = readScalar(item, kind)
    if (converted === undefined) return [...fallback]

    out.push(converted)
  }

  return out
}

export type ShaderPrecision = {
  rangeMin: number
  rangeMax: number
  precision: number
}

export function getShaderPrecision(
  doc: ConfigDocument,
  shaderType: number,
  precisionType: number,
  opts: WebGlOptions = {},
): ShaderPrecision | undefined {
  const value = lookup(doc, "shaderPrecisionFormats", `${shaderType},${precisionType}`, opts)
  if (!isJsonObject(value)) return undefined

  const field = (name: string): number | undefined => {
    const item = value.get(name)
    if (item === undefined) return undefined

    const integer = readSigned(item, INT32_MIN, INT32_MAX)
    return integer === undefined ? undefined : Number(integer)
  }

  const rangeMin = field("rangeMin")
  const rangeMax = field("rangeMax")
  const precision = field("precision")

  if (rangeMin === undefined || rangeMax === undefined || precision === undefined) {
    return undefined
  }

  return { rangeMin, rangeMax, precision }
}
