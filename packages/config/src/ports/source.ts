/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation, coercion and defaults happen in `loadConfig`.
 * Sources are applied in order; later sources override earlier ones, and a key
 * whose value is `undefined` counts as not provided.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "dotenv:.env". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
