import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** Applied in order, later wins. Defaults to `[new EnvSource()]`. */
  sources?: readonly ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    let values: Record<string, unknown>

    try {
      values = await source.load()
    } catch (err) {
      throw ConfigError.sourceFailed(source.name, err)
    }

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw ConfigError.validationFailed(z.prettifyError(result.error))
  }

  const resolved: Record<string, string> = {}

  for (const key of Object.keys(result.data)) {
    resolved[key] = provenance[key] ?? "default"
  }

  return new Config<T>(result.data, resolved, new Set(Object.keys(merged)))
}
