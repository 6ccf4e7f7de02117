import type { TimeSource } from "@tzline/clock"
import { createError, formatErrorChain } from "@tzline/errors"
import type { DestinationStream } from "pino"
import type { FormatPolicy } from "../../format/format-policy"
import { LineRenderer } from "../../format/line-renderer"
import { LogLevels, isLogLevelName, levelFromSeverity, type LogLevelName } from "../../ports/log-level"
import type { LogRecord, MessageBody } from "../../ports/log-record"
import type { Sink } from "../../ports/sink"
import type { Styler } from "../../ports/style"

export type LineDestinationOptions = {
  policy: FormatPolicy
  sink: Sink
  clock?: TimeSource
  styler?: Styler
}

export type LineDestination = DestinationStream & {
  flush(): void
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

function toLevelName(level: unknown): LogLevelName {
  if (typeof level === "number") return levelFromSeverity(level)
  if (isLogLevelName(level)) return level

  return levelFromSeverity(LogLevels.Info)
}

function toMessage(msg: string, err: unknown): MessageBody {
  if (err === undefined || err === null) return msg

  const chain = formatErrorChain(err)

  return msg ? [msg, "\n", chain] : [chain]
}

/**
 * Map one serialized pino entry onto a LogRecord.
 *
 * The `module` binding becomes the module path. `target` falls back to
 * `module` when it is not bound.
 */
export function parseLogLine(line: string): LogRecord {
  let parsed: unknown

  try {
    parsed = JSON.parse(line)
  } catch (err) {
    throw createError("invalid_log_record", "Log line is not valid JSON", {
      cause: err,
      context: { line },
    })
  }

  if (!isRecord(parsed)) {
    throw createError("invalid_log_record", "Log line is not a JSON object", {
      context: { line },
    })
  }

  const modulePath = typeof parsed.module === "string" ? parsed.module : undefined
  const msg = typeof parsed.msg === "string" ? parsed.msg : ""

  return {
    level: toLevelName(parsed.level),
    modulePath,
    target: typeof parsed.target === "string" ? parsed.target : (modulePath ?? ""),
    message: toMessage(msg, parsed.err),
  }
}

/**
 * pino destination that prints each entry as a header line instead of JSON.
 *
 * @example
 * ```ts
 * const destination = createLineDestination({
 *   policy: createFormatPolicy({ utcOffset: 8 * 3600 }),
 *   sink: new FdSink(2),
 * })
 * const logger = pino({ level: "debug" }, destination)
 * ```
 */
export function createLineDestination(options: LineDestinationOptions): LineDestination {
  const { policy, sink, clock, styler } = options

  return {
    write(line: string): void {
      new LineRenderer(policy, sink, { clock, styler }).render(parseLogLine(line))
    },
    flush(): void {
      sink.flush()
    },
  }
}
