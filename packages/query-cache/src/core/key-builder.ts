import type { CacheKey } from "@shelf/cache"
import type { RecordId } from "../ports/record"

const SEPARATOR = "_"

/**
 * `namespace`, or `namespace_suffix` for a named variant. Only an absent
 * (undefined or null) suffix yields the bare namespace; `""` gives
 * `namespace_`.
 */
export function collectionKey(namespace: string, suffix?: string | null): CacheKey {
  if (suffix === undefined || suffix === null) return namespace

  return `${namespace}${SEPARATOR}${suffix}`
}

export function detailKey(namespace: string, identifier: RecordId): CacheKey {
  return `${namespace}${SEPARATOR}${String(identifier)}`
}

export type CacheNamespace = Readonly<{
  prefix: string

  /** Prefix shared by every detail key and suffixed collection key. */
  variantPrefix: string

  collectionKey(suffix?: string | null): CacheKey
  detailKey(identifier: RecordId): CacheKey
}>

export function createCacheNamespace(prefix: string): CacheNamespace {
  return Object.freeze({
    prefix,
    variantPrefix: `${prefix}${SEPARATOR}`,
    collectionKey: (suffix?: string | null) => collectionKey(prefix, suffix),
    detailKey: (identifier: RecordId) => detailKey(prefix, identifier),
  })
}
