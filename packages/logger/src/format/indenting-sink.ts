import type { Sink } from "../ports/sink"

/**
 * Sink decorator that re-indents continuation lines.
 *
 * Every `\n` in a written chunk becomes the line terminator followed by
 * `indent` spaces. Works chunk by chunk, so a line break may fall anywhere
 * across writes.
 */
export class IndentingSink implements Sink {
  private readonly breakWith: string

  constructor(
    private readonly inner: Sink,
    indent: number,
    lineTerminator: string,
  ) {
    this.breakWith = lineTerminator + " ".repeat(indent)
  }

  write(chunk: string): void {
    const lines = chunk.split("\n")

    for (let i = 0; i < lines.length; i++) {
      if (i > 0) this.inner.write(this.breakWith)

      const line = lines[i]
      if (line) this.inner.write(line)
    }
  }

  flush(): void {
    this.inner.flush()
  }
}
