import type { LogContext, LogMeta } from "./log-context"

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Logger that adds `context` to every entry it emits, on top of the
   * parent's bindings. Used to scope logs to a request, a job or a worker.
   */
  child<U extends Partial<LogContext> & Record<string, unknown>>(
    context: U,
  ): Logger<TContext & U>
}
