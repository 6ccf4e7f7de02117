import pino from "pino"
import type { Sink } from "../../ports/sink"

type FdDestination = ReturnType<typeof pino.destination>

/**
 * Blocking writes to a file descriptor (stderr by default) through pino's
 * synchronous SonicBoom destination, which retries `EAGAIN` on non-blocking
 * pipes.
 *
 * SonicBoom reports write failures as `error` events, emitted during the
 * write in sync mode; they are rethrown from the `write` that caused them.
 * A broken pipe (`EPIPE`) is absorbed by pino and turns later writes into
 * no-ops.
 */
export class FdSink implements Sink {
  private readonly destination: FdDestination
  private failure: Error | undefined

  constructor(readonly fd: number = 2) {
    this.destination = pino.destination({ fd, sync: true })
    this.destination.on("error", (err: Error) => {
      this.failure = err
    })
  }

  write(chunk: string): void {
    this.throwIfFailed()
    this.destination.write(chunk)
    this.throwIfFailed()
  }

  flush(): void {
    this.throwIfFailed()
  }

  private throwIfFailed(): void {
    const failure = this.failure
    if (!failure) return

    this.failure = undefined
    throw failure
  }
}
