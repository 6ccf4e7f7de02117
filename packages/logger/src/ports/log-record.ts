import type { LogLevelName } from "./log-level"

/**
 * Message text of a record.
 *
 * A function is called once, at render time. An iterable is written chunk by
 * chunk, so a long body never has to be joined up front.
 */
export type MessageBody = string | (() => string) | Iterable<string>

/** One log event as the line renderer sees it. */
export type LogRecord = {
  level: LogLevelName
  modulePath?: string | undefined
  /** Empty string means "no target". */
  target: string
  message: MessageBody
}
