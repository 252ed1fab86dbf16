export { type DotenvSourceOptions, DotenvSource } from "./adapters/dotenv/dotenv-source"
export { type EnvSourceOptions, EnvSource } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export type { Rect, RectKeys } from "./core/accessors/rect-accessors"
export type { Voice } from "./core/accessors/voice-accessors"
export {
  type GlParameterValue,
  type ShaderPrecision,
  type WebGlOptions,
  WebGlDomains,
} from "./core/accessors/webgl-accessors"
export { asciiLowercase, type ReadThrough, ReadThroughListCache } from "./core/cache/read-through-list-cache"
export { bootstrap, configResolver } from "./core/default-resolver"
export {
  ConfigDocument,
  type DocumentOrigin,
  type DocumentStatus,
} from "./core/document/config-document"
export {
  type ErrorContext,
  isResolverError,
  ResolverError,
  type ResolverErrorCode,
  type ResolverErrorOptions,
  type SerializedError,
  serializeError,
} from "./core/errors/resolver-error"
export {
  isJsonArray,
  isJsonNumber,
  isJsonObject,
  type JsonArray,
  JsonNumber,
  type JsonObject,
  type JsonValue,
  type NumberKind,
} from "./core/json/json-value"
export { parseJson } from "./core/json/parse-json"
export { isScalarKind, type ScalarKind, type ScalarKindMap, type ScalarOf } from "./core/json/scalar"
export { createLogger } from "./core/logging/create-logger"
export { ConfigResolver, type ConfigResolverOptions, createConfigResolver } from "./core/resolver"
export { type LoadSettingsOptions, loadSettings } from "./core/settings/load-settings"
export { Settings } from "./core/settings/settings"
export {
  DEFAULT_VARIABLE,
  defaultSettings,
  type LoggerKind,
  type ResolverSettings,
  SETTINGS_PREFIX,
  settingsSchema,
} from "./core/settings/settings-schema"
export type { ISettings } from "./ports/settings"
export type { ValueSource } from "./ports/value-source"
