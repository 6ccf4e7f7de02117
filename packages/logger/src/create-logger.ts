import { SystemClock, type TimeSource } from "@tzline/clock"
import { NullLogger } from "./adapters/null/null-logger"
import { createLineDestination } from "./adapters/pino/line-destination"
import { PinoLogger } from "./adapters/pino/pino-logger"
import { FdSink } from "./adapters/sinks/fd-sink"
import { ansiStyler } from "./adapters/styles/ansi-styler"
import { plainStyler } from "./adapters/styles/plain-styler"
import { type LoggingConfig, policyFromConfig } from "./config/logging-config"
import type { LogContext } from "./ports/log-context"
import type { Logger } from "./ports/logger"
import type { Sink } from "./ports/sink"

export type CreateLoggerDeps = {
  /** Default: stderr */
  sink?: Sink
  clock?: TimeSource
}

/**
 * Build the application logger from loaded config: pino filters by level, the
 * line destination renders what passes.
 */
export function createLogger<TContext extends LogContext = LogContext>(
  config: LoggingConfig,
  deps: CreateLoggerDeps = {},
): Logger<TContext> {
  if (config.LOG_LEVEL === "off") return new NullLogger<TContext>()

  const clock = deps.clock ?? new SystemClock()
  const destination = createLineDestination({
    policy: policyFromConfig(config, { clock }),
    sink: deps.sink ?? new FdSink(2),
    clock,
    styler: config.LOG_STYLE === "always" ? ansiStyler : plainStyler,
  })

  return new PinoLogger<TContext>({ destination }, { level: config.LOG_LEVEL })
}
