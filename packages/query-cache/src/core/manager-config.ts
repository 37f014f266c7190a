import type { ErrorCode } from "@shelf/errors"
import { z } from "zod"
import type { CacheManagerConfig, ResolvedCacheManagerConfig } from "../ports/manager-config"
import { QueryCacheError } from "./errors"

const errorCodeSchema = z.custom<ErrorCode>(
  (v) => typeof v === "string" && /^[a-z][a-z0-9_]*$/.test(v),
  "Expected a lowercase snake_case error code",
)

const relationListSchema = z.array(z.string().min(1)).nullable().default(null)

const managerConfigSchema = z.object({
  model: z.object({
    name: z.string().min(1),
    identifier: z.string().min(1),
  }),
  cacheKey: z.string().min(1).nullable().default(null),
  relatedObjects: relationListSchema,
  prefetchRelatedObjects: relationListSchema,
  usePrefetchForList: z.boolean().default(true),
  listTimeout: z.number().positive().default(86400),
  detailTimeout: z.number().positive().default(60),
  notFoundError: errorCodeSchema.default("not_found"),
})

/**
 * Validate and default a manager config once, at construction. The result is
 * frozen.
 */
export function resolveManagerConfig<T extends object>(
  config: CacheManagerConfig<T>,
): ResolvedCacheManagerConfig<T> {
  const parsed = managerConfigSchema.safeParse(config)

  if (!parsed.success) {
    throw QueryCacheError.invalidConfiguration(z.prettifyError(parsed.error), parsed.error)
  }

  return Object.freeze({ ...parsed.data, model: config.model })
}
