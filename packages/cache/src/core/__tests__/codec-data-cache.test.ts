import { MemoryBytesCache } from "../../adapters/memory/memory-bytes-cache"
import { ManualTestClock } from "../../tests/utils/manual-test-clock"
import { createSuperjsonCodec } from "../codec/superjson-codec"
import { CodecDataCache } from "../codec-data-cache"

type Entry = { ids: number[]; storedAt: Date; criteria: { views: bigint } }

describe("CodecDataCache", () => {
  const make = () => {
    const clock = new ManualTestClock()
    const bytes = new MemoryBytesCache({ clock })

    return { clock, bytes, cache: new CodecDataCache<Entry>(bytes, createSuperjsonCodec()) }
  }

  it("round-trips rich values through superjson", async () => {
    const { cache } = make()
    const value: Entry = {
      ids: [3, 1, 2],
      storedAt: new Date("2025-02-01T12:00:00.000Z"),
      criteria: { views: 10n },
    }

    await cache.set("article", value)
    const res = await cache.get("article")

    expect(res).toStrictEqual({ kind: "hit", value })
  })

  it("passes misses through", async () => {
    const { cache } = make()

    expect(await cache.get("article")).toStrictEqual({ kind: "miss" })
  })

  it("forwards ttl and invalidation to the byte store", async () => {
    const { cache, clock } = make()
    const value: Entry = { ids: [], storedAt: new Date(0), criteria: { views: 0n } }

    await cache.set("article_1", value, { ttl: { kind: "seconds", seconds: 60 } })
    await cache.set("article_2", value)
    await cache.invalidate("article_2")

    expect((await cache.get("article_2")).kind).toBe("miss")
    clock.advance(60_000)
    expect((await cache.get("article_1")).kind).toBe("miss")
  })

  it("invalidates many keys", async () => {
    const { cache, bytes } = make()
    const value: Entry = { ids: [1], storedAt: new Date(0), criteria: { views: 1n } }

    await cache.set("article_1", value)
    await cache.set("article_2", value)
    await cache.invalidateMany(["article_1", "article_2"])

    expect(bytes.size).toBe(0)
  })

  it("rejects when stored bytes cannot be decoded", async () => {
    const { cache, bytes } = make()

    await bytes.set("article", new TextEncoder().encode("{not json"))

    await expect(cache.get("article")).rejects.toThrow(SyntaxError)
  })
})
