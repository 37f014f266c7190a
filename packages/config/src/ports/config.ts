/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ CACHE_DRIVER: z.enum(["memory", "redis"]).default("memory") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("CACHE_DRIVER")     // "redis"
 * config.explain("CACHE_DRIVER") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object. */
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct provenance labels, in first-use order. */
  sourcesUsed(): string[]

  /**
   * Keys some source provided that the schema does not define. Usually a
   * typo or a stale variable.
   */
  unknownKeys(): string[]
}
