import { DotenvSource, EnvSource } from "@tzline/config"
import { toAppError } from "@tzline/errors"
import { loadLoggingConfig } from "../config/logging-config"
import { createLogger } from "../create-logger"

export async function run(): Promise<void> {
  const config = await loadLoggingConfig([
    new DotenvSource({ file: ".env", required: false }),
    new EnvSource(),
  ])
  const logger = createLogger(config.value)

  logger.info("hello, world!")
  logger.debug(`level from ${config.explain("LOG_LEVEL")}, offset from ${config.explain("LOG_UTC_OFFSET")}`)

  const net = logger.child({ module: "tzline/dev/net", target: "net" })

  net.info("connecting\nretry 1\nretry 2")
  net.error("handshake failed", {
    err: new Error("connection reset", { cause: new Error("ECONNRESET") }),
  })
}

if (import.meta.url === `file://${process.argv[1]}`) {
  run().catch((err) => {
    const appErr = toAppError(err, "startup_failed")
    process.stderr.write(`${appErr.code}: ${appErr.message}\n`)
    process.exitCode = 1
  })
}
