export { NullLogger } from "./adapters/null/null-logger"
export {
  createLineDestination,
  type LineDestination,
  type LineDestinationOptions,
  parseLogLine,
} from "./adapters/pino/line-destination"
export { PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export { FdSink } from "./adapters/sinks/fd-sink"
export { MemorySink } from "./adapters/sinks/memory-sink"
export { StreamSink } from "./adapters/sinks/stream-sink"
export { ansiStyler } from "./adapters/styles/ansi-styler"
export { plainStyler } from "./adapters/styles/plain-styler"
export {
  type LoggingConfig,
  loadLoggingConfig,
  loggingConfigSchema,
  policyFromConfig,
} from "./config/logging-config"
export { type CreateLoggerDeps, createLogger } from "./create-logger"
export {
  createFormatPolicy,
  type FormatPolicy,
  type FormatPolicyDeps,
  type FormatPolicyOptions,
  isValidUtcOffset,
  localUtcOffset,
  MAX_UTC_OFFSET_SECONDS,
  TIMESTAMP_FORMATS,
  type TimestampPrecision,
  timestampPrecisions,
} from "./format/format-policy"
export { IndentingSink } from "./format/indenting-sink"
export { formatLine, LineRenderer, type LineRendererDeps } from "./format/line-renderer"
export { formatTimestamp, formatUtcOffset } from "./format/timestamp"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export {
  isLogLevelName,
  LEVEL_SEVERITY,
  type LogLevel,
  LogLevels,
  type LogLevelName,
  levelFromSeverity,
  levelLabel,
  logLevelNames,
} from "./ports/log-level"
export type { LogRecord, MessageBody } from "./ports/log-record"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
export type { Sink } from "./ports/sink"
export type { Style, Styler } from "./ports/style"
