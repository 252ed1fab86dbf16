import { createConsoleLogger, type Logger } from "@envdoc/logger"
import { EnvSource } from "../adapters/env/env-source"
import type { ValueSource } from "../ports/value-source"
import { getInt32Rect, getRect, type Rect, type RectKeys } from "./accessors/rect-accessors"
import {
  checkBool,
  getBool,
  getDouble,
  getInt32,
  getInt64,
  getString,
  getStringList,
  getUint32,
  getUint64,
} from "./accessors/scalar-accessors"
import { getVoices, type Voice } from "./accessors/voice-accessors"
import {
  type GlParameterValue,
  getContextAttribute,
  getGlParameter,
  getGlParameterOr,
  getGlParameterVector,
  getShaderPrecision,
  type ShaderPrecision,
  type WebGlOptions,
} from "./accessors/webgl-accessors"
import { ReadThroughListCache } from "./cache/read-through-list-cache"
import type { ConfigDocument } from "./document/config-document"
import { DocumentLoader } from "./document/document-loader"
import type { JsonValue } from "./json/json-value"
import type { ScalarKind, ScalarOf } from "./json/scalar"
import { DEFAULT_VARIABLE } from "./settings/settings-schema"

export type ConfigResolverOptions = {
  /** @default "MASK_CONFIG" */
  variable?: string
  /** @default EnvSource over process.env */
  source?: ValueSource
  /** @default console logger at `warn` */
  logger?: Logger
}

/**
 * Typed, non-throwing queries over one configuration document.
 *
 * The document is loaded on the first query. Missing, mistyped and
 * out-of-range values resolve to `undefined` or to the caller's default.
 */
export class ConfigResolver {
  readonly variable: string
  private readonly loader: DocumentLoader
  private readonly logger: Logger
  private readonly lists = new ReadThroughListCache()

  constructor(options: ConfigResolverOptions = {}) {
    this.variable = options.variable ?? DEFAULT_VARIABLE
    this.logger = (options.logger ?? createConsoleLogger({}, { level: "warn" })).child({
      module: "config-resolver",
      variable: this.variable,
    })
    this.loader = new DocumentLoader({
      source: options.source ?? new EnvSource(),
      variable: this.variable,
      logger: this.logger,
    })
  }

  get document(): ConfigDocument {
    return this.loader.materialize()
  }

  get isLoaded(): boolean {
    return this.loader.isMaterialized
  }

  explain(): string {
    return this.document.explain()
  }

  has(key: string): boolean {
    return this.document.has(key)
  }

  getString(key: string): string | undefined {
    return getString(this.document, key)
  }

  getBool(key: string): boolean | undefined {
    return getBool(this.document, key)
  }

  checkBool(key: string): boolean {
    return checkBool(this.document, key)
  }

  getUint32(key: string): number | undefined {
    return getUint32(this.document, key)
  }

  getUint64(key: string): bigint | undefined {
    return getUint64(this.document, key)
  }

  getInt32(key: string): number | undefined {
    return getInt32(this.document, key)
  }

  getInt64(key: string): bigint | undefined {
    return getInt64(this.document, key)
  }

  getDouble(key: string): number | undefined {
    return getDouble(this.document, key)
  }

  getStringList(key: string): string[] {
    return getStringList(this.document, key)
  }

  /** {@link getStringList}, ASCII lower-cased and cached per key. */
  getLowercasedList(key: string): string[] {
    return this.lists.getThrough(key, () => getStringList(this.document, key))
  }

  getRect(keys: RectKeys): Rect | undefined {
    return getRect(this.document, keys, this.logger)
  }

  getInt32Rect(keys: RectKeys): Rect | undefined {
    return getInt32Rect(this.document, keys, this.logger)
  }

  getNested(domain: string, key: string): JsonValue | undefined {
    return this.document.getNested(domain, key)
  }

  getContextAttribute<K extends ScalarKind>(
    name: string,
    kind: K,
    opts?: WebGlOptions,
  ): ScalarOf<K> | undefined {
    return getContextAttribute(this.document, name, kind, opts)
  }

  getGlParameter(pname: number, opts?: WebGlOptions): GlParameterValue | undefined {
    return getGlParameter(this.document, pname, opts)
  }

  getGlParameterOr<K extends ScalarKind>(
    pname: number,
    kind: K,
    fallback: ScalarOf<K>,
    opts?: WebGlOptions,
  ): ScalarOf<K> {
    return getGlParameterOr(this.document, pname, kind, fallback, opts)
  }

  getGlParameterVector<K extends ScalarKind>(
    pname: number,
    kind: K,
    fallback: readonly ScalarOf<K>[],
    opts?: WebGlOptions,
  ): ScalarOf<K>[] {
    return getGlParameterVector(this.document, pname, kind, fallback, opts)
  }

  getShaderPrecision(
    shaderType: number,
    precisionType: number,
    opts?: WebGlOptions,
  ): ShaderPrecision | undefined {
    return getShaderPrecision(this.document, shaderType, precisionType, opts)
  }

  getVoices(): Voice[] | undefined {
    return getVoices(this.document)
  }
}

export function createConfigResolver(options: ConfigResolverOptions = {}): ConfigResolver {
  return new ConfigResolver(options)
}
