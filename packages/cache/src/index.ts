export { MemoryBytesCache, type MemoryCacheDeps, type MemoryCacheOptions } from "./adapters/memory/memory-bytes-cache"
export { RedisBytesCache, type RedisBytesCacheOptions } from "./adapters/redis/redis-bytes-cache"
export {
  createRedisBytesClient,
  type RedisBytesClient,
  type RedisExpiration,
} from "./adapters/redis/redis-client"
export { createSuperjsonCodec } from "./core/codec/superjson-codec"
export { CodecDataCache } from "./core/codec-data-cache"
export { type Clock, SystemClock } from "./core/time/clock"
export type { BytesCache } from "./ports/bytes-cache"
export type { CacheKey } from "./ports/cache-key"
export { type CacheSetOptions, type CacheTtl, ttlSeconds } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { Codec } from "./ports/codec"
export type { DataCache } from "./ports/data-cache"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
export type { Milliseconds, Seconds } from "./ports/time"
