/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation and coercion happen in `loadConfig`, and
 * sources are applied in order so later ones override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. `"env"` or `"dotenv:.env"`. */
  readonly name: string

  /**
   * Resolve the values this source provides. A key mapped to `undefined`
   * counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}
