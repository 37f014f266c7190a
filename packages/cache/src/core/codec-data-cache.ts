import type { BytesCache } from "../ports/bytes-cache"
import type { CacheKey } from "../ports/cache-key"
import type { CacheSetOptions } from "../ports/cache-options"
import type { CacheResult } from "../ports/cache-result"
import type { Codec } from "../ports/codec"
import type { DataCache } from "../ports/data-cache"

export class CodecDataCache<T> implements DataCache<T> {
  public constructor(
    private readonly bytesCache: BytesCache,
    private readonly codec: Codec<T>,
  ) {}

  /** Decode failures reject; they are not turned into misses here. */
  async get(key: CacheKey): Promise<CacheResult<T>> {
    const res = await this.bytesCache.get(key)

    if (res.kind === "miss") return res

    return { kind: "hit", value: this.codec.decode(res.value) }
  }

  async set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<void> {
    await this.bytesCache.set(key, this.codec.encode(value), opts)
  }

  async invalidate(key: CacheKey): Promise<void> {
    await this.bytesCache.invalidate(key)
  }

  async invalidateMany(keys: readonly CacheKey[]): Promise<void> {
    await this.bytesCache.invalidateMany(keys)
  }
}
