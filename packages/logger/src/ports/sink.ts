/**
 * Raw text output for rendered lines.
 *
 * `write` is synchronous and throws when the destination refuses the chunk
 * (closed pipe, full disk). Renderers let that error propagate as is.
 */
export interface Sink {
  write(chunk: string): void
  flush(): void
}
