import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys starting with this are read, with the prefix stripped. */
  prefix?: string

  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>

  /**
   * Drop variables set to the empty string, so `REDIS_URL=` falls back to the
   * schema default instead of failing validation.
   *
   * @default true
   */
  emptyAsUnset?: boolean
}

export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly options: EnvSourceOptions = {}) {}

  async load(): Promise<Record<string, unknown>> {
    const { prefix = "", emptyAsUnset = true } = this.options
    const out: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.options.env ?? process.env)) {
      if (value === undefined || !key.startsWith(prefix)) continue
      if (emptyAsUnset && value === "") continue

      out[key.slice(prefix.length)] = value
    }

    return out
  }
}
