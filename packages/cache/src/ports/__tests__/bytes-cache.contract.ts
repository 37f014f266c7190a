import { bytes, keys } from "../../tests/utils/cache-test-helpers"
import type { BytesCache } from "../bytes-cache"

export type BytesCacheHarness = {
  name: string
  make: () => {
    cache: BytesCache
    /** Moves the adapter's notion of "now" forward. */
    advance: (ms: number) => void
  }
}

export function describeBytesCacheContract(h: BytesCacheHarness): void {
  describe(`BytesCache contract: ${h.name}`, () => {
    let cache: BytesCache
    let advance: (ms: number) => void

    beforeEach(() => {
      ;({ cache, advance } = h.make())
    })

    describe("get/set", () => {
      it("misses on an absent key", async () => {
        expect(await cache.get("missing")).toStrictEqual({ kind: "miss" })
      })

      it("returns the bytes that were set", async () => {
        await cache.set(keys.collection(), bytes.a())

        expect(await cache.get(keys.collection())).toStrictEqual({ kind: "hit", value: bytes.a() })
      })

      it("stores empty values", async () => {
        await cache.set(keys.detail(), bytes.empty())

        expect(await cache.get(keys.detail())).toStrictEqual({
          kind: "hit",
          value: bytes.empty(),
        })
      })

      it("overwrites existing entries", async () => {
        await cache.set(keys.detail(), bytes.a())
        await cache.set(keys.detail(), bytes.b())

        expect(await cache.get(keys.detail())).toStrictEqual({ kind: "hit", value: bytes.b() })
      })

      it("is unaffected by later mutation of the input", async () => {
        const value = bytes.a()

        await cache.set(keys.detail(), value)
        value[0] = 42

        expect(await cache.get(keys.detail())).toStrictEqual({ kind: "hit", value: bytes.a() })
      })
    })

    describe("ttl", () => {
      it("expires a seconds ttl once it has elapsed", async () => {
        await cache.set(keys.collection(), bytes.a(), { ttl: { kind: "seconds", seconds: 1 } })

        advance(999)
        expect((await cache.get(keys.collection())).kind).toBe("hit")

        advance(101)
        expect(await cache.get(keys.collection())).toStrictEqual({ kind: "miss" })
      })

      it("expires a milliseconds ttl", async () => {
        await cache.set(keys.detail(), bytes.a(), {
          ttl: { kind: "milliseconds", milliseconds: 250 },
        })

        advance(250)

        expect(await cache.get(keys.detail())).toStrictEqual({ kind: "miss" })
      })

      it("keeps entries without ttl", async () => {
        await cache.set(keys.detail(), bytes.a())

        advance(86_400_000)

        expect((await cache.get(keys.detail())).kind).toBe("hit")
      })

      it("resets the ttl on overwrite", async () => {
        await cache.set(keys.detail(), bytes.a(), { ttl: { kind: "seconds", seconds: 1 } })
        advance(800)
        await cache.set(keys.detail(), bytes.b(), { ttl: { kind: "seconds", seconds: 1 } })
        advance(800)

        expect(await cache.get(keys.detail())).toStrictEqual({ kind: "hit", value: bytes.b() })
      })
    })

    describe("invalidate", () => {
      it("removes an entry", async () => {
        await cache.set(keys.detail(), bytes.a())

        await cache.invalidate(keys.detail())

        expect(await cache.get(keys.detail())).toStrictEqual({ kind: "miss" })
      })

      it("ignores absent keys", async () => {
        await expect(cache.invalidate("missing")).resolves.toBeUndefined()
      })

      it("removes many entries and leaves the rest", async () => {
        await cache.set(keys.collection(), bytes.a())
        await cache.set(keys.detail(1), bytes.a())
        await cache.set(keys.detail(2), bytes.a())
        await cache.set(keys.other(), bytes.b())

        await cache.invalidateMany([keys.collection(), keys.detail(1), keys.detail(2), "missing"])

        expect(await cache.get(keys.detail(2))).toStrictEqual({ kind: "miss" })
        expect(await cache.get(keys.other())).toStrictEqual({ kind: "hit", value: bytes.b() })
      })

      it("accepts an empty key list", async () => {
        await expect(cache.invalidateMany([])).resolves.toBeUndefined()
      })
    })

    describe("keys", () => {
      it("lists live keys under a literal prefix", async () => {
        await cache.set(keys.collection(), bytes.a())
        await cache.set(keys.detail(1), bytes.a())
        await cache.set(keys.variant(), bytes.a())
        await cache.set(keys.other(), bytes.a())

        const found = await cache.keys("article_")

        expect(found.sort()).toEqual(["article_1", "article_published"])
      })

      it("skips expired keys", async () => {
        await cache.set(keys.detail(1), bytes.a(), { ttl: { kind: "seconds", seconds: 1 } })
        await cache.set(keys.detail(2), bytes.a())

        advance(1000)

        expect(await cache.keys("article_")).toEqual(["article_2"])
      })

      it("treats glob characters in the prefix literally", async () => {
        await cache.set("report*_1", bytes.a())
        await cache.set("reportX_1", bytes.a())

        expect(await cache.keys("report*_")).toEqual(["report*_1"])
      })
    })
  })
}
