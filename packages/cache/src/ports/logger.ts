export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Context every cache log line may carry.
 */
export type LogContext = {
  module: string
  backend: string
  digest: string
  path: string
  key: string
}

export type LogMeta = Partial<LogContext> & {
  err?: unknown
} & Record<string, unknown>

export type LogBindings = Partial<LogContext> & Record<string, unknown>

export interface Logger {
  trace(message: string, meta?: LogMeta): void
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  fatal(message: string, meta?: LogMeta): void

  /**
   * Creates a child logger whose entries all carry `bindings` in addition to
   * the parent's.
   */
  child(bindings: LogBindings): Logger
}

export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Any log entries below this level are ignored.
   */
  level: LogLevelName

  /**
   * Pretty-print for local development; keep structured JSON in production.
   */
  prettify?: boolean
}
