import { createClient, RESP_TYPES } from "redis"

export type RedisExpiration = {
  expiration: { type: "EX" | "PX" | "EXAT"; value: number }
}

/**
 * The slice of a node-redis client the bytes cache needs, with bulk strings
 * mapped to `Buffer`.
 */
export type RedisBytesClient = {
  get(key: string): Promise<Buffer | null>
  set(key: string, value: Uint8Array | Buffer, opts?: RedisExpiration): Promise<unknown>
  del(keys: string | string[]): Promise<number>
  keys(pattern: string): Promise<Buffer[]>

  connect(): Promise<unknown>
  close(): Promise<unknown>
  readonly isOpen: boolean
}

export function createRedisBytesClient(url: string): RedisBytesClient {
  return createClient({ url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}
