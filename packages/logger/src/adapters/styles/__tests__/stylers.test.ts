import { ansiStyler } from "../ansi-styler"
import { plainStyler } from "../plain-styler"

describe("plainStyler", () => {
  it("returns empty markers for every level", () => {
    expect(plainStyler.levelStyle("error")).toEqual({ start: "", end: "" })
  })
})

describe("ansiStyler", () => {
  it.each([
    ["trace", "\x1b[36m"],
    ["debug", "\x1b[34m"],
    ["info", "\x1b[32m"],
    ["warn", "\x1b[33m"],
    ["error", "\x1b[1;31m"],
    ["fatal", "\x1b[1;31m"],
  ] as const)("starts %s with its color and resets after", (level, start) => {
    expect(ansiStyler.levelStyle(level)).toEqual({ start, end: "\x1b[0m" })
  })
})
