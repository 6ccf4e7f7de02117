import { FakeClock } from "@tzline/clock"
import { EnvSource, ObjectSource } from "@tzline/config"
import { BaseError } from "@tzline/errors"
import { TIMESTAMP_FORMATS } from "../../format/format-policy"
import { loadLoggingConfig, loggingConfigSchema, policyFromConfig } from "../logging-config"

describe("loadLoggingConfig", () => {
  it("fills in defaults", async () => {
    const config = await loadLoggingConfig([new EnvSource({ env: {} })])

    expect(config.value).toEqual({
      LOG_LEVEL: "info",
      LOG_SHOW_TIMESTAMP: true,
      LOG_SHOW_LEVEL: true,
      LOG_SHOW_MODULE_PATH: false,
      LOG_SHOW_TARGET: true,
      LOG_INDENT: 4,
      LOG_STYLE: "never",
    })
    expect(config.explain("LOG_LEVEL")).toBe("default")
  })

  it("parses every key from strings", async () => {
    const config = await loadLoggingConfig([
      new EnvSource({
        env: {
          LOG_LEVEL: " WARN ",
          LOG_UTC_OFFSET: "-18000",
          LOG_TIMESTAMP_PRECISION: "micros",
          LOG_SHOW_TIMESTAMP: "no",
          LOG_SHOW_LEVEL: "1",
          LOG_SHOW_MODULE_PATH: "true",
          LOG_SHOW_TARGET: "off",
          LOG_INDENT: "2",
          LOG_STYLE: "always",
        },
      }),
    ])

    expect(config.value).toEqual({
      LOG_LEVEL: "warn",
      LOG_UTC_OFFSET: -18_000,
      LOG_TIMESTAMP_PRECISION: "micros",
      LOG_SHOW_TIMESTAMP: false,
      LOG_SHOW_LEVEL: true,
      LOG_SHOW_MODULE_PATH: true,
      LOG_SHOW_TARGET: false,
      LOG_INDENT: 2,
      LOG_STYLE: "always",
    })
  })

  it("reads LOG_INDENT=none as verbatim bodies", async () => {
    const config = await loadLoggingConfig([new EnvSource({ env: { LOG_INDENT: "none" } })])

    expect(config.get("LOG_INDENT")).toBeNull()
  })

  it.each(["", "   ", "abc", "3600.5"])("reads LOG_UTC_OFFSET=%j as unset", async (raw) => {
    const config = await loadLoggingConfig([new EnvSource({ env: { LOG_UTC_OFFSET: raw } })])

    expect(config.get("LOG_UTC_OFFSET")).toBeUndefined()
  })

  it("trims a numeric LOG_UTC_OFFSET", async () => {
    const config = await loadLoggingConfig([new EnvSource({ env: { LOG_UTC_OFFSET: " 19800 " } })])

    expect(config.get("LOG_UTC_OFFSET")).toBe(19_800)
  })

  it("accepts off as a level", async () => {
    const config = await loadLoggingConfig([new EnvSource({ env: { LOG_LEVEL: "OFF" } })])

    expect(config.get("LOG_LEVEL")).toBe("off")
  })

  it("lets later sources win and records where values came from", async () => {
    const config = await loadLoggingConfig([
      new EnvSource({ env: { LOG_LEVEL: "debug", LOG_STYLE: "always" } }),
      new ObjectSource({ LOG_LEVEL: "error" }, "cli"),
    ])

    expect(config.get("LOG_LEVEL")).toBe("error")
    expect(config.explain("LOG_LEVEL")).toBe("object:cli")
    expect(config.explain("LOG_STYLE")).toBe("env")
  })

  it("rejects invalid values with the failing keys", async () => {
    const load = loadLoggingConfig([
      new EnvSource({ env: { LOG_LEVEL: "verbose", LOG_INDENT: "-1", LOG_STYLE: "auto" } }),
    ])

    await expect(load).rejects.toBeInstanceOf(BaseError)
    await expect(load).rejects.toMatchObject({
      code: "config_invalid",
      context: { issues: ["LOG_LEVEL", "LOG_INDENT", "LOG_STYLE"] },
    })
  })
})

describe("policyFromConfig", () => {
  const originalTz = process.env.TZ

  beforeEach(() => {
    process.env.TZ = "Asia/Shanghai"
  })

  afterEach(() => {
    if (originalTz === undefined) delete process.env.TZ
    else process.env.TZ = originalTz
  })

  it("carries config values into the policy", () => {
    const config = loggingConfigSchema.parse({
      LOG_UTC_OFFSET: "28800",
      LOG_TIMESTAMP_PRECISION: "seconds",
      LOG_SHOW_MODULE_PATH: "true",
      LOG_INDENT: "none",
    })

    expect(policyFromConfig(config)).toEqual({
      timestampFormat: TIMESTAMP_FORMATS.seconds,
      utcOffset: 28_800,
      showTimestamp: true,
      showLevel: true,
      showModulePath: true,
      showTarget: true,
      indent: null,
      lineTerminator: "\n",
    })
  })

  it.each(["", "abc", "3600.5"])("falls back to the local offset for LOG_UTC_OFFSET=%j", (raw) => {
    const clock = new FakeClock(Date.UTC(2024, 0, 1))
    const config = loggingConfigSchema.parse({ LOG_UTC_OFFSET: raw })

    expect(policyFromConfig(config, { clock }).utcOffset).toBe(28_800)
  })

  it("falls back to the local offset for an out-of-range offset", () => {
    const clock = new FakeClock(Date.UTC(2024, 0, 1))
    const config = loggingConfigSchema.parse({ LOG_UTC_OFFSET: "90000" })

    expect(policyFromConfig(config, { clock }).utcOffset).toBe(28_800)
  })
})
