import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * Byte-oriented key-value store with per-entry expiry. Adapters own
 * eviction, persistence and replication; callers own the value format.
 */
export interface BytesCache {
  get(key: CacheKey): Promise<CacheResult<Uint8Array>>

  /** Overwrites any existing entry. */
  set(key: CacheKey, value: Uint8Array, opts?: Partial<CacheSetOptions>): Promise<void>

  /** Deleting an absent key is a no-op. */
  invalidate(key: CacheKey): Promise<void>

  invalidateMany(keys: readonly CacheKey[]): Promise<void>

  /**
   * Live keys starting with `prefix`, in no particular order. The prefix is
   * matched literally.
   */
  keys(prefix: string): Promise<CacheKey[]>
}
