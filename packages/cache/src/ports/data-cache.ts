import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * Typed view over a {@link BytesCache} for derived, non-authoritative data.
 *
 * Entries may be evicted or stale at any time. If losing a value would cause
 * an incident, it does not belong here.
 */
export interface DataCache<T> {
  get(key: CacheKey): Promise<CacheResult<T>>

  set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<void>

  invalidate(key: CacheKey): Promise<void>

  invalidateMany(keys: readonly CacheKey[]): Promise<void>
}
