import {
  type BytesCache,
  type CacheKey,
  type Clock,
  CodecDataCache,
  createSuperjsonCodec,
  type DataCache,
  type Seconds,
  SystemClock,
  ttlSeconds,
} from "@shelf/cache"
import { createNullLogger, type Logger } from "@shelf/logger"
import {
  type CachedCollectionEntry,
  type CachedDetailEntry,
  type CachedEntry,
  cachedEntrySchema,
} from "../ports/cached-entry"
import type { ComposableQuery } from "../ports/composable-query"
import type { Criteria } from "../ports/criteria"
import type { DataSource } from "../ports/data-source"
import type { CacheManagerConfig, ResolvedCacheManagerConfig } from "../ports/manager-config"
import type { RecordId } from "../ports/record"
import { QueryCacheError } from "./errors"
import { type CacheNamespace, createCacheNamespace } from "./key-builder"
import { resolveManagerConfig } from "./manager-config"

export type CacheManagerDeps<T extends object> = {
  store: BytesCache
  dataSource: DataSource<T>
  logger?: Logger
  clock?: Clock
}

export type FetchCollectionOptions<T> = {
  /** Names the variant; the entry is stored under `namespace_suffix`. */
  suffix?: string | null
  criteria?: Criteria<T>
}

export type FetchDetailOptions = {
  /** When false a missing record resolves `null` instead of rejecting. @default true */
  raiseOnMissing?: boolean
}

function union(...lists: (readonly string[] | null)[]): string[] {
  return [...new Set(lists.flatMap((list) => list ?? []))]
}

/**
 * Read-through cache for one record type.
 *
 * Collections are cached as identifier sequences and handed back as
 * composable queries scoped to those identifiers, so anything chained on
 * the result runs against the live data source. Details are cached as an
 * identifier and re-read on every hit.
 *
 * Cache store failures on the read path are logged and treated as misses.
 * Data source failures propagate.
 */
export class CacheManager<T extends object> {
  readonly config: ResolvedCacheManagerConfig<T>
  readonly logger: Logger

  private readonly namespace: CacheNamespace
  private readonly entries: DataCache<unknown>
  private readonly clock: Clock
  private readonly listEagerLoad: readonly string[]
  private readonly detailEagerLoad: readonly string[]

  constructor(
    private readonly deps: CacheManagerDeps<T>,
    config: CacheManagerConfig<T>,
  ) {
    this.config = resolveManagerConfig(config)

    const { cacheKey, model, relatedObjects, prefetchRelatedObjects } = this.config

    this.namespace = createCacheNamespace(cacheKey ?? model.name.toLowerCase())
    this.entries = new CodecDataCache<unknown>(deps.store, createSuperjsonCodec())
    this.clock = deps.clock ?? new SystemClock()
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "query-cache",
      namespace: this.namespace.prefix,
    })

    this.detailEagerLoad = union(relatedObjects, prefetchRelatedObjects)
    this.listEagerLoad = this.config.usePrefetchForList
      ? this.detailEagerLoad
      : union(relatedObjects)
  }

  cacheKeyNamespace(): string {
    return this.namespace.prefix
  }

  collectionKey(suffix?: string | null): CacheKey {
    return this.namespace.collectionKey(suffix)
  }

  detailKey(identifier: RecordId): CacheKey {
    return this.namespace.detailKey(identifier)
  }

  async fetchCollection(options: FetchCollectionOptions<T> = {}): Promise<ComposableQuery<T>> {
    const { suffix, criteria } = options
    const key = this.collectionKey(suffix)

    if (criteria !== undefined && key === this.namespace.prefix) {
      this.logger.warn("Caching filtered collection under the bare collection key", {
        cacheKey: key,
      })
    }

    const cached = await this.readEntry(key, "collection")

    if (cached !== undefined) {
      this.logger.debug("Collection cache hit", { cacheKey: key, size: cached.ids.length })

      return this.deps.dataSource.query(undefined, this.listEagerLoad).byIdentifiers(cached.ids)
    }

    this.logger.debug("Collection cache miss", { cacheKey: key })

    const query = this.deps.dataSource.query(criteria, this.listEagerLoad)
    const ids = await query.identifiers()

    const entry: CachedCollectionEntry = {
      kind: "collection",
      ids,
      suffix: suffix ?? null,
      criteria: criteria ?? null,
      storedAt: this.clock.nowMs(),
    }
    await this.writeEntry(key, entry, this.config.listTimeout)

    return query
  }

  fetchDetail(
    identifier: RecordId,
    criteria: Criteria<T>,
    options?: FetchDetailOptions & { raiseOnMissing?: true },
  ): Promise<T>
  fetchDetail(
    identifier: RecordId,
    criteria: Criteria<T>,
    options: FetchDetailOptions,
  ): Promise<T | null>
  async fetchDetail(
    identifier: RecordId,
    criteria: Criteria<T>,
    options: FetchDetailOptions = {},
  ): Promise<T | null> {
    const raiseOnMissing = options.raiseOnMissing ?? true
    const key = this.detailKey(identifier)
    const cached = await this.readEntry(key, "detail")

    if (cached !== undefined) {
      const record = await this.deps.dataSource
        .query(undefined, this.detailEagerLoad)
        .byIdentifiers([cached.id])
        .first()

      if (record !== undefined) {
        this.logger.debug("Detail cache hit", { cacheKey: key })
        return record
      }

      this.logger.warn("Detail cache entry points at a missing record", { cacheKey: key })
      await this.invalidateQuietly([key])

      return this.missing(identifier, raiseOnMissing)
    }

    this.logger.debug("Detail cache miss", { cacheKey: key })

    const record = await this.deps.dataSource.queryOne(criteria, this.detailEagerLoad)

    if (record === undefined) return this.missing(identifier, raiseOnMissing)

    const entry: CachedDetailEntry = {
      kind: "detail",
      id: this.identifierOf(record),
      storedAt: this.clock.nowMs(),
    }
    await this.writeEntry(key, entry, this.config.detailTimeout)

    return record
  }

  /**
   * The model's identifier field of `value` when it is a record. Bare
   * strings and numbers are not treated as identifiers.
   */
  findIdentifier(value: unknown): RecordId | undefined {
    if (typeof value !== "object" || value === null) return undefined

    const id: unknown = Reflect.get(value, this.config.model.identifier)

    return typeof id === "string" || typeof id === "number" ? id : undefined
  }

  identifierOf(record: T): RecordId {
    const id = this.findIdentifier(record)

    if (id === undefined) {
      const field = this.config.model.identifier
      throw QueryCacheError.invalidIdentifier(field, Reflect.get(record, field))
    }

    return id
  }

  /** Delete the given keys. Store failures propagate. */
  async invalidate(keys: readonly CacheKey[]): Promise<void> {
    if (keys.length === 0) return

    await this.deps.store.invalidateMany(keys)
    this.logger.debug("Invalidated cache keys", { keys: [...keys] })
  }

  /** Delete the bare collection key. */
  async clearCollection(): Promise<void> {
    await this.invalidate([this.collectionKey()])
  }

  /** Delete every detail key and suffixed collection key in the namespace. */
  async clearVariants(): Promise<void> {
    await this.invalidate(await this.deps.store.keys(this.namespace.variantPrefix))
  }

  async clearCache(): Promise<void> {
    await this.clearCollection()
    await this.clearVariants()
  }

  private missing(identifier: RecordId, raiseOnMissing: boolean): null {
    if (raiseOnMissing) {
      throw QueryCacheError.notFound(this.config.notFoundError, {
        model: this.config.model.name,
        identifier,
      })
    }

    return null
  }

  private readEntry(key: CacheKey, kind: "collection"): Promise<CachedCollectionEntry | undefined>
  private readEntry(key: CacheKey, kind: "detail"): Promise<CachedDetailEntry | undefined>
  private async readEntry(key: CacheKey, kind: CachedEntry["kind"]): Promise<CachedEntry | undefined> {
    let raw: unknown

    try {
      const res = await this.entries.get(key)
      if (res.kind === "miss") return undefined

      raw = res.value
    } catch (err) {
      this.logger.warn("Cache read failed, falling back to the data source", { cacheKey: key, err })
      return undefined
    }

    const parsed = cachedEntrySchema.safeParse(raw)

    if (!parsed.success) {
      this.logger.warn("Ignoring malformed cache entry", { cacheKey: key })
      return undefined
    }

    if (parsed.data.kind !== kind) {
      this.logger.warn("Ignoring cache entry of another kind", {
        cacheKey: key,
        expected: kind,
        found: parsed.data.kind,
      })
      return undefined
    }

    return parsed.data
  }

  private async writeEntry(key: CacheKey, entry: CachedEntry, timeout: Seconds): Promise<void> {
    try {
      await this.entries.set(key, entry, { ttl: ttlSeconds(timeout) })
    } catch (err) {
      this.logger.warn("Cache write failed, returning uncached result", { cacheKey: key, err })
    }
  }

  private async invalidateQuietly(keys: readonly CacheKey[]): Promise<void> {
    try {
      await this.invalidate(keys)
    } catch (err) {
      this.logger.error("Cache invalidation failed", { keys: [...keys], err })
    }
  }
}
