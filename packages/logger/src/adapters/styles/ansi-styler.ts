import type { LogLevelName } from "../../ports/log-level"
import type { Style, Styler } from "../../ports/style"

const esc = (code: string) => `\x1b[${code}m`
const reset = esc("0")

const sgr = (code: string): Style => Object.freeze({ start: esc(code), end: reset })

const LEVEL_STYLES: Readonly<Record<LogLevelName, Style>> = {
  trace: sgr("36"),
  debug: sgr("34"),
  info: sgr("32"),
  warn: sgr("33"),
  error: sgr("1;31"),
  fatal: sgr("1;31"),
}

/**
 * SGR colors per level: trace cyan, debug blue, info green, warn yellow,
 * error and fatal bold red.
 */
export const ansiStyler: Styler = {
  levelStyle: (level) => LEVEL_STYLES[level],
}
