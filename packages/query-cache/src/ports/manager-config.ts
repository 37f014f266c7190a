import type { Seconds } from "@shelf/cache"
import type { ErrorCode } from "@shelf/errors"
import type { RecordModel } from "./record"

export type CacheManagerConfig<T extends object> = {
  model: RecordModel<T>

  /** Namespace override. Defaults to `model.name.toLowerCase()`. */
  cacheKey?: string | null

  /** Eager loads applied to both list and detail queries. */
  relatedObjects?: readonly string[] | null

  /**
   * Eager loads for detail queries, and for list queries too unless
   * `usePrefetchForList` is false.
   */
  prefetchRelatedObjects?: readonly string[] | null

  /** @default true */
  usePrefetchForList?: boolean

  /** @default 86400 */
  listTimeout?: Seconds

  /** @default 60 */
  detailTimeout?: Seconds

  /** Code of the error raised when a detail lookup finds nothing. @default "not_found" */
  notFoundError?: ErrorCode
}

export type ResolvedCacheManagerConfig<T extends object> = Readonly<{
  model: RecordModel<T>
  cacheKey: string | null
  relatedObjects: readonly string[] | null
  prefetchRelatedObjects: readonly string[] | null
  usePrefetchForList: boolean
  listTimeout: Seconds
  detailTimeout: Seconds
  notFoundError: ErrorCode
}>
