import { errorChain } from "./error-chain"

function stringField(link: object, key: "stack" | "name" | "type" | "message"): string | undefined {
  if (!(key in link)) return undefined

  const value: unknown = Reflect.get(link, key)
  return typeof value === "string" ? value : undefined
}

function describeLink(link: unknown): string {
  if (typeof link !== "object" || link === null) return String(link)

  const stack = stringField(link, "stack")
  if (stack) return stack

  const name = stringField(link, "name") ?? stringField(link, "type") ?? "Error"
  const message = stringField(link, "message") ?? ""

  return message ? `${name}: ${message}` : name
}

/**
 * Render an error and its causes as newline-separated text.
 *
 * Each link prints its stack when it has one, otherwise `name: message`.
 * Works on live errors and on their JSON form (`type` stands in for `name`).
 *
 * @example
 * ```text
 * Error: connect refused
 *     at dial (net.ts:12:9)
 * Caused by: Error: ECONNREFUSED
 * ```
 */
export function formatErrorChain(err: unknown, maxDepth?: number): string {
  return errorChain(err, maxDepth)
    .map((link, i) => (i === 0 ? describeLink(link) : `Caused by: ${describeLink(link)}`))
    .join("\n")
}
