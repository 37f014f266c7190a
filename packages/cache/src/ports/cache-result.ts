/** Outcome of a cache read. Expired entries read as misses. */
export type CacheResult<T> = CacheHit<T> | CacheMiss

export type CacheHit<T> = Readonly<{ kind: "hit"; value: T }>

export type CacheMiss = Readonly<{ kind: "miss" }>
