import type { BytesCache } from "../../ports/bytes-cache"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions, CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { RedisBytesClient, RedisExpiration } from "./redis-client"

export type RedisBytesCacheOptions = {
  /**
   * Maximum number of keys per `DEL` in `invalidateMany`. Larger requests
   * are split so a single command stays small.
   */
  batchSize: number

  keyspacePrefix: KeyspacePrefix
}

const GLOB_SPECIAL = /[*?[\]\\]/g

export class RedisBytesCache implements BytesCache {
  public constructor(
    private readonly client: RedisBytesClient,
    private readonly opts: RedisBytesCacheOptions,
  ) {
    if (!Number.isInteger(opts.batchSize) || opts.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${opts.batchSize}`)
    }
  }

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const buffer = await this.client.get(this.fullKey(key))

    if (buffer === null) return { kind: "miss" }

    return { kind: "hit", value: new Uint8Array(buffer) }
  }

  async set(key: CacheKey, value: Uint8Array, opts?: Partial<CacheSetOptions>): Promise<void> {
    const fullKey = this.fullKey(key)

    if (opts?.ttl) {
      await this.client.set(fullKey, value, this.toRedisExpiration(opts.ttl))
    } else {
      await this.client.set(fullKey, value)
    }
  }

  async invalidate(key: CacheKey): Promise<void> {
    await this.client.del(this.fullKey(key))
  }

  async invalidateMany(keys: readonly CacheKey[]): Promise<void> {
    if (keys.length === 0) return

    const fullKeys = keys.map((k) => this.fullKey(k))

    for (const batch of this.chunks(fullKeys, this.opts.batchSize)) {
      await this.client.del(batch)
    }
  }

  /**
   * Uses `KEYS`, which blocks the server while it scans. Fine for the
   * occasional namespace clear, not for hot paths.
   */
  async keys(prefix: string): Promise<CacheKey[]> {
    const pattern = `${this.escapeGlob(this.fullKey(prefix))}*`
    const found = await this.client.keys(pattern)
    const keyspaceLength = this.opts.keyspacePrefix.length

    return found.map((k) => k.toString("utf8").slice(keyspaceLength))
  }

  private *chunks<T>(items: readonly T[], size: number): Generator<T[]> {
    for (let i = 0; i < items.length; i += size) {
      yield items.slice(i, i + size)
    }
  }

  private toRedisExpiration(ttl: CacheTtl): RedisExpiration {
    if (ttl.kind === "seconds") {
      return Number.isInteger(ttl.seconds)
        ? { expiration: { type: "EX", value: ttl.seconds } }
        : { expiration: { type: "PX", value: Math.round(ttl.seconds * 1000) } }
    }

    if (ttl.kind === "milliseconds") {
      return { expiration: { type: "PX", value: Math.round(ttl.milliseconds) } }
    }

    return { expiration: { type: "EXAT", value: Math.floor(ttl.expiresAt.getTime() / 1000) } }
  }

  private escapeGlob(value: string): string {
    return value.replace(GLOB_SPECIAL, (c) => `\\${c}`)
  }

  private fullKey(k: CacheKey): string {
    return `${this.opts.keyspacePrefix}${k}`
  }
}
