import type { LogLevelName } from "./log-level"

/** Markers written around a styled value. Empty strings mean unstyled. */
export type Style = Readonly<{
  start: string
  end: string
}>

export interface Styler {
  levelStyle(level: LogLevelName): Style
}
