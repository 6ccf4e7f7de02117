import { FakeClock } from "@tzline/clock"
import { BaseError } from "@tzline/errors"
import { createFormatPolicy } from "../../../format/format-policy"
import { MemorySink } from "../../sinks/memory-sink"
import { createLineDestination, parseLogLine } from "../line-destination"

describe("parseLogLine", () => {
  it("maps level, module and message", () => {
    expect(parseLogLine('{"level":40,"time":1,"module":"app/db","msg":"slow"}\n')).toEqual({
      level: "warn",
      modulePath: "app/db",
      target: "app/db",
      message: "slow",
    })
  })

  it("keeps an explicit target, even an empty one", () => {
    expect(parseLogLine('{"level":30,"module":"app/db","target":"sql","msg":"q"}').target).toBe("sql")
    expect(parseLogLine('{"level":30,"module":"app/db","target":"","msg":"q"}').target).toBe("")
  })

  it("uses an empty target when neither target nor module is bound", () => {
    expect(parseLogLine('{"level":30,"msg":"q"}')).toEqual({
      level: "info",
      modulePath: undefined,
      target: "",
      message: "q",
    })
  })

  it.each([
    ['{"level":35}', "info"],
    ['{"level":5}', "trace"],
    ['{"level":99}', "fatal"],
    ['{"level":"debug"}', "debug"],
    ['{"level":"loud"}', "info"],
    ["{}", "info"],
  ])("reads the level of %s as %s", (line, level) => {
    expect(parseLogLine(line).level).toBe(level)
  })

  it("defaults a missing message to an empty string", () => {
    expect(parseLogLine('{"level":30}').message).toBe("")
  })

  it("appends a serialized error after the message", () => {
    const line = JSON.stringify({ level: 50, msg: "failed", err: { type: "TypeError", message: "bad" } })

    expect(parseLogLine(line).message).toEqual(["failed", "\n", "TypeError: bad"])
  })

  it("uses the error alone as the body when there is no message", () => {
    const line = JSON.stringify({ level: 50, err: { type: "Error", message: "boom", stack: "Error: boom" } })

    expect(parseLogLine(line).message).toEqual(["Error: boom"])
  })

  it.each(["not json", "[1,2]", "null", '"text"'])("rejects %s", (line) => {
    expect(() => parseLogLine(line)).toThrow(BaseError)
  })

  it("keeps the parse error as the cause", () => {
    try {
      parseLogLine("{")
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toMatchObject({ code: "invalid_log_record", context: { line: "{" } })
      expect(err).toHaveProperty("cause", expect.any(SyntaxError))
    }
  })
})

describe("createLineDestination", () => {
  it("renders each written entry as one line", () => {
    const sink = new MemorySink()
    const clock = new FakeClock(Date.UTC(2024, 0, 1, 4))
    const destination = createLineDestination({
      policy: createFormatPolicy({ utcOffset: 0, precision: "seconds" }),
      sink,
      clock,
    })

    destination.write('{"level":30,"target":"net","msg":"up"}\n')
    clock.advance(1000)
    destination.write('{"level":40,"target":"net","msg":"slow"}\n')

    expect(sink.text()).toBe(
      "[2024-01-01 04:00:00 +00:00 INFO  net] up\n[2024-01-01 04:00:01 +00:00 WARN  net] slow\n",
    )
  })
})
