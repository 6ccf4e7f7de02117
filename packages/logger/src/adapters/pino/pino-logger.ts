import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import { createFormatPolicy } from "../../format/format-policy"
import type { LogContextPatch, LogContext, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"
import { FdSink } from "../sinks/fd-sink"
import { ansiStyler } from "../styles/ansi-styler"
import { createLineDestination } from "./line-destination"

export type PinoLoggerDeps = {
  /** Where serialized entries go. Default: stdout, or header lines on stderr when prettified. */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase
  protected readonly opts: Partial<LoggerOptions>

  constructor(
    private readonly deps: PinoLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
    base?: PinoLoggerBase,
  ) {
    this.opts = opts
    this.logger = this.init(bindings, base)
  }

  private init(bindings: LogContextPatch, base?: PinoLoggerBase): PinoLoggerBase {
    if (base) return base.child(bindings)

    const pinoOpts: PinoOptions = {
      ...(this.opts.level ? { level: this.opts.level } : {}),
      serializers: { err: errWithCause },
    }

    const destination = this.deps.destination ?? this.prettyDestination()

    return (destination ? pino(pinoOpts, destination) : pino(pinoOpts)).child(bindings)
  }

  private prettyDestination(): DestinationStream | undefined {
    if (!this.opts.prettify) return undefined

    return createLineDestination({
      policy: createFormatPolicy(),
      sink: new FdSink(2),
      styler: ansiStyler,
    })
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

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(this.deps, this.opts, context, this.logger)
  }
}
