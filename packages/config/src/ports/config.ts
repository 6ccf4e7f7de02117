/**
 * Validated, read-only configuration with per-key provenance.
 *
 * @typeParam T - Shape of the configuration, usually inferred from a zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ LOG_LEVEL: z.enum(["info", "debug"]).default("info") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("LOG_LEVEL")     // "debug"
 * config.explain("LOG_LEVEL") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that supplied the final value for `key`, or `"default"`
   * when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   *
   * @remarks
   * With an unprefixed `EnvSource` this includes the whole process environment.
   */
  unknownKeys(): string[]
}
