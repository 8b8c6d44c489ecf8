import type { LogLevelName } from "./log-level"

export type LogContext = {
  command: string
  format: string
  service: string
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> & {
  err?: unknown
} & Record<string, unknown>

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Creates a logger that adds `context` to every entry, on top of the
   * parent's context.
   */
  child<U extends Partial<LogContext> & Record<string, unknown>>(context: U): Logger<TContext & U>
}

/**
 * @remarks
 * Adapters must honor `level`. `prettify` is meant for a terminal; leave it
 * off when logs are collected.
 */
export type LoggerOptions = {
  level: LogLevelName
  prettify?: boolean
}
