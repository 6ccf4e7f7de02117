import type { Style, Styler } from "../../ports/style"

const NO_STYLE: Style = Object.freeze({ start: "", end: "" })

/** Writes values without markers; for files, pipes and log collectors. */
export const plainStyler: Styler = {
  levelStyle: () => NO_STYLE,
}
