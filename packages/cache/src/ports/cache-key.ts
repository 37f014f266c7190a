/**
 * CacheKey is a plain string. Adapters treat it as opaque and only prepend
 * their keyspace prefix.
 *
 * @example
 * ```ts
 * const key: CacheKey = "article_42"
 * ```
 */
export type CacheKey = string
