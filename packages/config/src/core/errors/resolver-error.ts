export type ResolverErrorCode =
  | "invalid_json"
  | "invalid_root"
  | "number_out_of_range"
  | "source_unavailable"
  | "invalid_settings"

/**
 * Structured metadata attached to errors (variable names, positions, ...).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type ResolverErrorOptions = Readonly<{
  code: ResolverErrorCode
  context?: ErrorContext
  cause?: unknown
}>

/**
 * Serialized error shape for log payloads. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  cause?: SerializedError
}>

/**
 * Failure inside the resolver.
 *
 * Accessors never let one escape: document-level failures are logged and
 * degrade to an empty document. Only `loadSettings` throws it to its caller.
 */
export class ResolverError extends Error {
  readonly code: ResolverErrorCode
  readonly context: ErrorContext
  readonly timestamp: Date

  constructor(message: string, options: ResolverErrorOptions) {
    super(message, { cause: options.cause })

    this.name = "ResolverError"
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.timestamp = new Date()
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export function isResolverError(err: unknown): err is ResolverError {
  return err instanceof ResolverError
}

/**
 * Serialize any thrown value to a consistent shape.
 *
 * Plain errors get the code `"unknown"`; non-Error values are wrapped.
 */
export function serializeError(err: unknown): SerializedError {
  if (err instanceof ResolverError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause) }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause) }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    timestamp: new Date().toISOString(),
  }
}
