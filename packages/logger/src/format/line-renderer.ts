import { SystemClock, type TimeSource } from "@tzline/clock"
import { createError } from "@tzline/errors"
import { plainStyler } from "../adapters/styles/plain-styler"
import { MemorySink } from "../adapters/sinks/memory-sink"
import { type LogLevelName, levelLabel } from "../ports/log-level"
import type { LogRecord, MessageBody } from "../ports/log-record"
import type { Sink } from "../ports/sink"
import type { Styler } from "../ports/style"
import type { FormatPolicy } from "./format-policy"
import { IndentingSink } from "./indenting-sink"
import { formatTimestamp } from "./timestamp"

const LEVEL_WIDTH = 5

const systemClock = new SystemClock()

export type LineRendererDeps = {
  /** Read once per line, when the timestamp is written. */
  clock?: TimeSource
  styler?: Styler
}

function chunksOf(message: MessageBody): Iterable<string> {
  if (typeof message === "string") return [message]
  if (typeof message === "function") return [message()]

  return message
}

/**
 * Renders a single record as `[header fields] body<terminator>`.
 *
 * One renderer per record: `render` may be called once. Sink errors are not
 * caught, so a failed write leaves a partial line behind.
 */
export class LineRenderer {
  private headerStarted = false
  private consumed = false
  private readonly clock: TimeSource
  private readonly styler: Styler

  constructor(
    private readonly policy: FormatPolicy,
    private readonly sink: Sink,
    deps: LineRendererDeps = {},
  ) {
    this.clock = deps.clock ?? systemClock
    this.styler = deps.styler ?? plainStyler
  }

  render(record: LogRecord): void {
    if (this.consumed) {
      throw createError("renderer_consumed", "LineRenderer.render() may only be called once", {
        isOperational: false,
      })
    }
    this.consumed = true

    this.writeTimestamp()
    this.writeLevel(record.level)
    this.writeModulePath(record.modulePath)
    this.writeTarget(record.target)
    this.finishHeader()

    this.writeBody(record.message)
    this.sink.write(this.policy.lineTerminator)
  }

  private writeHeaderValue(value: string): void {
    if (!this.headerStarted) {
      this.headerStarted = true
      this.sink.write(`[${value}`)
    } else {
      this.sink.write(` ${value}`)
    }
  }

  private writeTimestamp(): void {
    if (!this.policy.showTimestamp) return

    this.writeHeaderValue(
      formatTimestamp(this.clock.nowMicros(), this.policy.utcOffset, this.policy.timestampFormat),
    )
  }

  private writeLevel(level: LogLevelName): void {
    if (!this.policy.showLevel) return

    const { start, end } = this.styler.levelStyle(level)
    this.writeHeaderValue(`${start}${levelLabel(level).padEnd(LEVEL_WIDTH)}${end}`)
  }

  private writeModulePath(modulePath: string | undefined): void {
    if (!this.policy.showModulePath || !modulePath) return

    this.writeHeaderValue(modulePath)
  }

  private writeTarget(target: string): void {
    if (!this.policy.showTarget || target === "") return

    this.writeHeaderValue(target)
  }

  private finishHeader(): void {
    if (this.headerStarted) this.sink.write("] ")
  }

  private writeBody(message: MessageBody): void {
    const { indent, lineTerminator } = this.policy
    // fast path: no wrapper when bodies are written verbatim
    const out = indent === null ? this.sink : new IndentingSink(this.sink, indent, lineTerminator)

    for (const chunk of chunksOf(message)) {
      if (chunk) out.write(chunk)
    }
  }
}

/** Render one record to a string. */
export function formatLine(
  policy: FormatPolicy,
  record: LogRecord,
  deps: LineRendererDeps = {},
): string {
  const sink = new MemorySink()
  new LineRenderer(policy, sink, deps).render(record)

  return sink.text()
}
