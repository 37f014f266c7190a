import type { BytesCache, CacheKey } from "@shelf/cache"
import { createNullLogger, type Logger } from "@shelf/logger"
import type { RecordId } from "../ports/record"

export type Operation<A extends unknown[], R> = (...args: A) => Promise<R>

/** Fixed keys, or keys derived from the operation's result and arguments. */
export type InvalidationKeys<A extends unknown[], R> =
  | readonly CacheKey[]
  | ((result: R, ...args: A) => readonly CacheKey[])

export type CacheKeyInvalidationOptions<A extends unknown[], R> = {
  keys: InvalidationKeys<A, R>
  logger?: Logger
}

/**
 * What {@link withManagerInvalidation} needs from a manager. `CacheManager`
 * satisfies it.
 */
export interface InvalidationTarget {
  readonly logger: Logger
  collectionKey(): CacheKey
  detailKey(identifier: RecordId): CacheKey
  findIdentifier(value: unknown): RecordId | undefined
  invalidate(keys: readonly CacheKey[]): Promise<void>
}

export type ManagerInvalidationOptions<A extends unknown[], R> = {
  additionalKeys?: InvalidationKeys<A, R>

  /**
   * Identifier whose detail key to drop. Defaults to the model's identifier
   * field when the result is a record. An operation that yields a bare id
   * must say so here.
   */
  identify?: (result: R, ...args: A) => RecordId | undefined

  /** Defaults to the manager's logger. */
  logger?: Logger
}

function resolveKeys<A extends unknown[], R>(
  keys: InvalidationKeys<A, R> | undefined,
  result: R,
  args: A,
): readonly CacheKey[] {
  if (keys === undefined) return []

  return typeof keys === "function" ? keys(result, ...args) : keys
}

async function invalidateAfterSuccess(
  invalidate: (keys: readonly CacheKey[]) => Promise<void>,
  keys: readonly CacheKey[],
  logger: Logger,
): Promise<void> {
  if (keys.length === 0) return

  try {
    await invalidate(keys)
  } catch (err) {
    logger.error("Cache invalidation failed; stale entries remain until they expire", {
      keys: [...keys],
      err,
    })
  }
}

/**
 * Wrap `op` so that, once it resolves, the listed keys are deleted from
 * `store`. A rejection passes through and deletes nothing. A failed delete
 * is logged and does not affect the result.
 *
 * @example
 * ```ts
 * const publish = withCacheKeyInvalidation(articles.publish, store, {
 *   keys: ["article_published"],
 * })
 * ```
 */
export function withCacheKeyInvalidation<A extends unknown[], R>(
  op: Operation<A, R>,
  store: Pick<BytesCache, "invalidateMany">,
  options: CacheKeyInvalidationOptions<A, R>,
): Operation<A, R> {
  const logger = options.logger ?? createNullLogger()

  return async (...args: A): Promise<R> => {
    const result = await op(...args)
    const keys = [...new Set(resolveKeys(options.keys, result, args))]

    await invalidateAfterSuccess((k) => store.invalidateMany(k), keys, logger)

    return result
  }
}

/**
 * Wrap `op` so that, once it resolves, the manager's collection key, the
 * detail key of the affected record (when one can be identified) and any
 * `additionalKeys` are deleted. Failure handling matches
 * {@link withCacheKeyInvalidation}.
 */
export function withManagerInvalidation<A extends unknown[], R>(
  op: Operation<A, R>,
  manager: InvalidationTarget,
  options: ManagerInvalidationOptions<A, R> = {},
): Operation<A, R> {
  const logger = options.logger ?? manager.logger

  return async (...args: A): Promise<R> => {
    const result = await op(...args)

    const identifier = options.identify
      ? options.identify(result, ...args)
      : manager.findIdentifier(result)

    const keys = new Set<CacheKey>([manager.collectionKey()])
    if (identifier !== undefined) keys.add(manager.detailKey(identifier))
    for (const key of resolveKeys(options.additionalKeys, result, args)) keys.add(key)

    await invalidateAfterSuccess((k) => manager.invalidate(k), [...keys], logger)

    return result
  }
}
