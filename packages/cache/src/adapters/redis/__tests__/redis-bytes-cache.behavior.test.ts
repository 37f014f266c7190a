import { type MockProxy, mock } from "vitest-mock-extended"
import { FakeRedisBytesClient } from "../../../tests/utils/fake-redis-bytes-client"
import { ManualTestClock } from "../../../tests/utils/manual-test-clock"
import { RedisBytesCache } from "../redis-bytes-cache"
import type { RedisBytesClient } from "../redis-client"

describe("RedisBytesCache (behavior)", () => {
  const keyspacePrefix = "catalog:test:"

  describe("commands", () => {
    let client: MockProxy<RedisBytesClient>
    let cache: RedisBytesCache

    beforeEach(() => {
      client = mock<RedisBytesClient>()
      cache = new RedisBytesCache(client, { batchSize: 2, keyspacePrefix })
    })

    it("prefixes keys on get", async () => {
      client.get.mockResolvedValue(Buffer.from([7]))

      const res = await cache.get("article_1")

      expect(client.get).toHaveBeenCalledWith("catalog:test:article_1")
      expect(res).toStrictEqual({ kind: "hit", value: new Uint8Array([7]) })
    })

    it("maps whole seconds to EX", async () => {
      await cache.set("article", new Uint8Array([1]), { ttl: { kind: "seconds", seconds: 60 } })

      expect(client.set).toHaveBeenCalledWith("catalog:test:article", new Uint8Array([1]), {
        expiration: { type: "EX", value: 60 },
      })
    })

    it("maps fractional seconds to PX", async () => {
      await cache.set("article", new Uint8Array([1]), { ttl: { kind: "seconds", seconds: 1.5 } })

      expect(client.set).toHaveBeenCalledWith("catalog:test:article", new Uint8Array([1]), {
        expiration: { type: "PX", value: 1500 },
      })
    })

    it("maps deadlines to EXAT", async () => {
      await cache.set("article", new Uint8Array([1]), {
        ttl: { kind: "until", expiresAt: new Date("2025-01-01T00:00:10.900Z") },
      })

      expect(client.set).toHaveBeenCalledWith("catalog:test:article", new Uint8Array([1]), {
        expiration: { type: "EXAT", value: 1735689610 },
      })
    })

    it("writes without expiration when no ttl is given", async () => {
      await cache.set("article", new Uint8Array([1]))

      expect(client.set).toHaveBeenCalledWith("catalog:test:article", new Uint8Array([1]))
    })

    it("splits invalidateMany into batches", async () => {
      await cache.invalidateMany(["a", "b", "c", "d", "e"])

      expect(client.del.mock.calls.map(([arg]) => arg)).toStrictEqual([
        ["catalog:test:a", "catalog:test:b"],
        ["catalog:test:c", "catalog:test:d"],
        ["catalog:test:e"],
      ])
    })

    it("skips the round trip for an empty invalidateMany", async () => {
      await cache.invalidateMany([])

      expect(client.del).not.toHaveBeenCalled()
    })

    it("escapes the prefix and strips the keyspace from KEYS results", async () => {
      client.keys.mockResolvedValue([Buffer.from("catalog:test:article_[1]_x")])

      const found = await cache.keys("article_[1]")

      expect(client.keys).toHaveBeenCalledWith("catalog:test:article_\\[1\\]*")
      expect(found).toEqual(["article_[1]_x"])
    })
  })

  it("rejects a non-positive batch size", () => {
    const client = mock<RedisBytesClient>()

    expect(() => new RedisBytesCache(client, { batchSize: 0, keyspacePrefix })).toThrow(RangeError)
  })

  it("isolates caches with different keyspace prefixes", async () => {
    const client = new FakeRedisBytesClient(new ManualTestClock())
    const a = new RedisBytesCache(client, { batchSize: 10, keyspacePrefix: "a:" })
    const b = new RedisBytesCache(client, { batchSize: 10, keyspacePrefix: "b:" })

    await a.set("article_1", new Uint8Array([1]))

    expect((await b.get("article_1")).kind).toBe("miss")
    expect(await b.keys("article_")).toEqual([])
    expect(await a.keys("article_")).toEqual(["article_1"])
  })
})
