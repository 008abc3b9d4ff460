export type CacheErrorCode =
  | "invalid_key"
  | "invalid_argument"
  | "corrupt_record"
  | "invalid_config"

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (keys, paths, etc.) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type CacheErrorOptions<C extends CacheErrorCode = CacheErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

export class CacheError<C extends CacheErrorCode = CacheErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, corrupt data on disk);
   * `false` for invariant violations.
   */
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: CacheErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeCacheError(this)
  }
}

export class InvalidKeyError extends CacheError<"invalid_key"> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: "invalid_key", ...(context && { context }) })
  }
}

export class InvalidArgumentError extends CacheError<"invalid_argument"> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: "invalid_argument", ...(context && { context }) })
  }
}

export class CorruptRecordError extends CacheError<"corrupt_record"> {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(message, { code: "corrupt_record", ...options })
  }
}

export class CacheConfigError extends CacheError<"invalid_config"> {
  constructor(message: string, context?: ErrorContext) {
    super(message, {
      code: "invalid_config",
      isOperational: false,
      ...(context && { context }),
    })
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * - CacheError instances keep their code and context
 * - other Error instances get code "unknown"
 * - non-Error thrown values are wrapped with the value as context
 */
export function serializeCacheError(
  err: unknown,
  options?: SerializeOptions,
): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof CacheError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeCacheError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeCacheError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
