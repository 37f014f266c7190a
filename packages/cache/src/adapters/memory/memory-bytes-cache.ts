import type { Clock } from "../../core/time/clock"
import type { BytesCache } from "../../ports/bytes-cache"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions, CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { Milliseconds } from "../../ports/time"

export type MemoryCacheOptions = {
  /**
   * Upper bound on retained entries. When a new key would exceed it, the
   * least recently used entry is evicted. Unbounded when omitted.
   */
  maxEntries?: number
}

export type MemoryCacheDeps = {
  clock: Clock
}

type MemoryCacheEntry = {
  value: Uint8Array
  expiresAtMs?: Milliseconds
}

/**
 * Process-local {@link BytesCache}. Map insertion order doubles as recency
 * order: reads and writes move a key to the end, eviction takes the front.
 */
export class MemoryBytesCache implements BytesCache {
  private readonly store = new Map<CacheKey, MemoryCacheEntry>()

  public constructor(
    private readonly deps: MemoryCacheDeps,
    private readonly opts: MemoryCacheOptions = {},
  ) {
    if (opts.maxEntries !== undefined && !(opts.maxEntries >= 1)) {
      throw new RangeError(`maxEntries must be at least 1, got ${opts.maxEntries}`)
    }
  }

  get size(): number {
    return this.store.size
  }

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const entry = this.liveEntry(key)

    if (entry === undefined) return { kind: "miss" }

    this.store.delete(key)
    this.store.set(key, entry)

    return { kind: "hit", value: entry.value.slice() }
  }

  async set(key: CacheKey, value: Uint8Array, opts?: Partial<CacheSetOptions>): Promise<void> {
    if (this.store.has(key)) {
      this.store.delete(key)
    } else {
      this.evictFor(1)
    }

    this.store.set(key, {
      value: value.slice(),
      ...(opts?.ttl && { expiresAtMs: this.toExpiresAtMs(opts.ttl) }),
    })
  }

  async invalidate(key: CacheKey): Promise<void> {
    this.store.delete(key)
  }

  async invalidateMany(keys: readonly CacheKey[]): Promise<void> {
    for (const key of keys) {
      this.store.delete(key)
    }
  }

  async keys(prefix: string): Promise<CacheKey[]> {
    const out: CacheKey[] = []

    for (const key of [...this.store.keys()]) {
      if (key.startsWith(prefix) && this.liveEntry(key) !== undefined) out.push(key)
    }

    return out
  }

  private liveEntry(key: CacheKey): MemoryCacheEntry | undefined {
    const entry = this.store.get(key)

    if (entry === undefined) return undefined

    if (entry.expiresAtMs !== undefined && entry.expiresAtMs <= this.deps.clock.nowMs()) {
      this.store.delete(key)
      return undefined
    }

    return entry
  }

  private toExpiresAtMs(ttl: CacheTtl): Milliseconds {
    const ms = this.deps.clock.nowMs()

    if (ttl.kind === "seconds") return ms + ttl.seconds * 1000
    if (ttl.kind === "milliseconds") return ms + ttl.milliseconds

    return ttl.expiresAt.getTime()
  }

  private evictFor(spaceNeeded: number): void {
    const max = this.opts.maxEntries
    if (max === undefined) return

    for (const victim of this.store.keys()) {
      if (this.store.size + spaceNeeded <= max) return

      this.store.delete(victim)
    }
  }
}
