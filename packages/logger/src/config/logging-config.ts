import { type ConfigSource, type IConfig, loadConfig } from "@tzline/config"
import type { TimeSource } from "@tzline/clock"
import { z } from "zod"
import { createFormatPolicy, type FormatPolicy, timestampPrecisions } from "../format/format-policy"
import { logLevelNames } from "../ports/log-level"

/**
 * Blank, unparsable and fractional offsets read as unset, so the format policy
 * falls back to the local offset instead of failing startup.
 */
function parseUtcOffset(raw: unknown): number | undefined {
  if (typeof raw === "number") return Number.isInteger(raw) ? raw : undefined
  if (typeof raw !== "string" || raw.trim() === "") return undefined

  const seconds = Number(raw.trim())
  return Number.isInteger(seconds) ? seconds : undefined
}

/**
 * Environment-driven logging settings.
 *
 * | key                       | default |
 * | ------------------------- | ------- |
 * | `LOG_LEVEL`               | `info` (`off` disables logging) |
 * | `LOG_UTC_OFFSET`          | local offset at startup (seconds east of UTC; blank or invalid also means local) |
 * | `LOG_TIMESTAMP_PRECISION` | `millis` |
 * | `LOG_SHOW_TIMESTAMP`      | `true` |
 * | `LOG_SHOW_LEVEL`          | `true` |
 * | `LOG_SHOW_MODULE_PATH`    | `false` |
 * | `LOG_SHOW_TARGET`         | `true` |
 * | `LOG_INDENT`              | `4` (`none` writes bodies verbatim) |
 * | `LOG_STYLE`               | `never` |
 */
export const loggingConfigSchema = z.object({
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["off", ...logLevelNames]))
    .default("info"),
  LOG_UTC_OFFSET: z.preprocess(parseUtcOffset, z.number().int().optional()),
  LOG_TIMESTAMP_PRECISION: z.enum(timestampPrecisions).optional(),
  LOG_SHOW_TIMESTAMP: z.stringbool().default(true),
  LOG_SHOW_LEVEL: z.stringbool().default(true),
  LOG_SHOW_MODULE_PATH: z.stringbool().default(false),
  LOG_SHOW_TARGET: z.stringbool().default(true),
  LOG_INDENT: z
    .union([z.literal("none"), z.coerce.number().int().nonnegative()])
    .default(4)
    .transform((indent) => (indent === "none" ? null : indent)),
  LOG_STYLE: z.enum(["always", "never"]).default("never"),
})

export type LoggingConfig = z.infer<typeof loggingConfigSchema>

export function loadLoggingConfig(sources?: ConfigSource[]): Promise<IConfig<LoggingConfig>> {
  return loadConfig({ schema: loggingConfigSchema, sources })
}

export function policyFromConfig(
  config: LoggingConfig,
  deps: { clock?: TimeSource } = {},
): FormatPolicy {
  return createFormatPolicy(
    {
      utcOffset: config.LOG_UTC_OFFSET,
      precision: config.LOG_TIMESTAMP_PRECISION,
      showTimestamp: config.LOG_SHOW_TIMESTAMP,
      showLevel: config.LOG_SHOW_LEVEL,
      showModulePath: config.LOG_SHOW_MODULE_PATH,
      showTarget: config.LOG_SHOW_TARGET,
      indent: config.LOG_INDENT,
    },
    deps,
  )
}
