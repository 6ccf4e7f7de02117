function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Walk the `cause` chain of an error, or of a plain object shaped like one
 * (a serialized error inside a log record works too).
 *
 * Stops at `maxDepth` entries or at the first repeated object.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    if (!isRecord(current) || current.cause === undefined) break
    current = current.cause
  }

  return chain
}
