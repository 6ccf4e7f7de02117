import type { Writable } from "node:stream"
import { createError } from "@tzline/errors"
import type { Sink } from "../../ports/sink"

/**
 * Sink over a Node writable stream.
 *
 * Stream writes fail asynchronously, so an `error` event is held and thrown
 * from the next `write` or `flush`.
 *
 * Backpressure is not applied. A slow consumer makes chunks queue in the
 * stream's buffer past `writableHighWaterMark`; lines are never dropped or cut
 * short because of it.
 */
export class StreamSink implements Sink {
  private failure: Error | undefined

  constructor(private readonly stream: Writable) {
    stream.on("error", (err: Error) => {
      this.failure = err
    })
  }

  write(chunk: string): void {
    this.throwIfFailed()

    if (this.stream.writableEnded || this.stream.destroyed) {
      throw createError("sink_closed", "Output stream has been closed")
    }

    // a false return only signals a full buffer; the chunk is still queued
    this.stream.write(chunk)
  }

  flush(): void {
    this.throwIfFailed()
  }

  private throwIfFailed(): void {
    if (this.failure) throw this.failure
  }
}
