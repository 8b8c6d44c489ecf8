import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, Logger, LoggerOptions, LogMeta } from "../ports/logger"

export type PinoLoggerOptions = Partial<LoggerOptions> & {
  /**
   * Where JSON lines are written. Defaults to stderr so that stdout carries
   * command output only. Ignored when `prettify` is set.
   */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  protected readonly logger: PinoLoggerBase

  constructor(
    protected readonly opts: PinoLoggerOptions = {},
    bindings: Record<string, unknown> = {},
    base?: PinoLoggerBase,
  ) {
    this.logger = base ? base.child(bindings) : this.init().child(bindings)
  }

  private init(): PinoLoggerBase {
    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
    }

    if (this.opts.prettify) {
      return pino({
        ...pinoOpts,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "hostname,pid",
            destination: 2,
          },
        },
      })
    }

    return pino(pinoOpts, this.opts.destination ?? pino.destination(2))
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.logger.trace(meta ?? {}, message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.logger.error(meta ?? {}, message)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.logger.fatal(meta ?? {}, message)
  }

  child<U extends Partial<LogContext> & Record<string, unknown>>(
    context: U,
  ): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(this.opts, context, this.logger)
  }
}
