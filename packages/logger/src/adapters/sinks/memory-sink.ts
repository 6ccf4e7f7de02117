import type { Sink } from "../../ports/sink"

/** Keeps every chunk in memory. */
export class MemorySink implements Sink {
  readonly chunks: string[] = []
  private flushes = 0

  write(chunk: string): void {
    this.chunks.push(chunk)
  }

  flush(): void {
    this.flushes++
  }

  text(): string {
    return this.chunks.join("")
  }

  flushCount(): number {
    return this.flushes
  }

  clear(): void {
    this.chunks.length = 0
  }
}
