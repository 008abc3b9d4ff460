import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogBindings, Logger, LoggerOptions, LogMeta } from "../../ports/logger"

export type PinoLoggerDeps = {
  /**
   * Base pino logger to create children from (inherits config).
   * When provided, this adapter will only add `bindings` via `.child(...)`.
   */
  base?: PinoLoggerBase

  /**
   * Destination stream for pino output. Defaults to stdout.
   */
  destination?: DestinationStream
}

export class PinoLogger implements Logger {
  protected readonly logger: PinoLoggerBase

  constructor(
    private readonly deps: PinoLoggerDeps = {},
    private readonly opts: Partial<LoggerOptions> = {},
    bindings: LogBindings = {},
  ) {
    this.logger = this.init(bindings)
  }

  private init(bindings: LogBindings): PinoLoggerBase {
    if (this.deps.base) return this.deps.base.child(bindings)

    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
      ...(this.opts.prettify &&
        !this.deps.destination && {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss.l",
              ignore: "hostname",
            },
          },
        }),
    }

    const root = this.deps.destination
      ? pino(pinoOpts, this.deps.destination)
      : pino(pinoOpts)

    return root.child(bindings)
  }

  trace(message: string, meta?: LogMeta): void {
    this.logger.trace(meta ?? {}, message)
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta): void {
    this.logger.error(meta ?? {}, message)
  }

  fatal(message: string, meta?: LogMeta): void {
    this.logger.fatal(meta ?? {}, message)
  }

  child(bindings: LogBindings): Logger {
    return new PinoLogger({ base: this.logger }, this.opts, bindings)
  }
}

export function createPinoLogger(
  opts: Partial<LoggerOptions> = {},
  deps: PinoLoggerDeps = {},
): Logger {
  return new PinoLogger(deps, opts)
}
