import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Write here instead of stdout. Disables the pretty transport. */
  destination?: DestinationStream

  /** Existing pino instance to derive from, used by `child()`. */
  base?: PinoLoggerBase
}

type Bindings = Partial<LogContext> & Record<string, unknown>

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly logger: PinoLoggerBase

  constructor(
    private readonly deps: PinoLoggerDeps = {},
    private readonly opts: Partial<LoggerOptions> = {},
    bindings: Bindings = {},
  ) {
    this.logger = this.init(bindings)
  }

  private init(bindings: Bindings): PinoLoggerBase {
    if (this.deps.base) return this.deps.base.child(bindings)

    const pinoOpts: PinoOptions = {
      ...(this.opts.level !== undefined && { level: this.opts.level }),
      serializers: { err: errWithCause },
      ...(this.opts.prettify &&
        this.deps.destination === undefined && {
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

    const root = this.deps.destination ? pino(pinoOpts, this.deps.destination) : pino(pinoOpts)

    return root.child(bindings)
  }

  trace(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.trace(meta, message)
  }

  debug(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.debug(meta, message)
  }

  info(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.info(meta, message)
  }

  warn(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.warn(meta, message)
  }

  error(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.error(meta, message)
  }

  fatal(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.fatal(meta, message)
  }

  child<U extends Partial<LogContext> & Record<string, unknown>>(
    context: U,
  ): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({ base: this.logger }, this.opts, context)
  }
}

export function createPinoLogger(
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  bindings: Bindings = {},
): Logger {
  return new PinoLogger(deps, opts, bindings)
}
