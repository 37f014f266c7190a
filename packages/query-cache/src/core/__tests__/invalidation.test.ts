import { type BytesCache, MemoryBytesCache } from "@shelf/cache"
import { ManualTestClock } from "@shelf/cache/testing"
import type { Logger } from "@shelf/logger"
import { type MockProxy, mock } from "vitest-mock-extended"
import {
  type Article,
  articleModel,
  createArticleSource,
  makeArticles,
} from "../../tests/utils/article-fixtures"
import { CacheManager } from "../cache-manager"
import { type InvalidationTarget, withCacheKeyInvalidation, withManagerInvalidation } from "../invalidation"

const bytes = new Uint8Array([1])

describe("invalidation", () => {
  let store: MemoryBytesCache

  beforeEach(async () => {
    store = new MemoryBytesCache({ clock: new ManualTestClock() })

    for (const key of ["article", "article_1", "article_2", "article_published", "author"]) {
      await store.set(key, bytes)
    }
  })

  async function liveKeys(): Promise<string[]> {
    return (await store.keys("")).sort()
  }

  describe("withCacheKeyInvalidation", () => {
    it("deletes exactly the listed keys after success", async () => {
      const op = withCacheKeyInvalidation(async (n: number) => n * 2, store, {
        keys: ["article", "article_published"],
      })

      expect(await op(21)).toBe(42)
      expect(await liveKeys()).toStrictEqual(["article_1", "article_2", "author"])
    })

    it("derives keys from the result and arguments", async () => {
      const op = withCacheKeyInvalidation(async (id: number, _title: string) => ({ id }), store, {
        keys: (result, id, title) => [`article_${result.id}`, `article_${title}`, `article_${id}`],
      })

      await op(2, "published")

      expect(await liveKeys()).toStrictEqual(["article", "article_1", "author"])
    })

    it("deletes each key once", async () => {
      const spy = vi.spyOn(store, "invalidateMany")
      const op = withCacheKeyInvalidation(async () => undefined, store, { keys: ["author", "author"] })

      await op()

      expect(spy).toHaveBeenCalledWith(["author"])
    })

    it("passes failures through and deletes nothing", async () => {
      const failure = new Error("write rejected")
      const op = withCacheKeyInvalidation(
        async () => {
          throw failure
        },
        store,
        { keys: ["article"] },
      )

      await expect(op()).rejects.toBe(failure)
      expect(await liveKeys()).toHaveLength(5)
    })

    it("logs a failed delete and still returns the result", async () => {
      const failing = mock<BytesCache>()
      failing.invalidateMany.mockRejectedValue(new Error("connection reset"))
      const logger = mock<Logger>()

      const op = withCacheKeyInvalidation(async () => "ok", failing, { keys: ["article"], logger })

      expect(await op()).toBe("ok")
      expect(logger.error).toHaveBeenCalledWith(
        "Cache invalidation failed; stale entries remain until they expire",
        expect.objectContaining({ keys: ["article"] }),
      )
    })
  })

  describe("withManagerInvalidation", () => {
    let manager: CacheManager<Article>

    beforeEach(() => {
      manager = new CacheManager<Article>({ store, dataSource: createArticleSource() }, { model: articleModel })
    })

    it("deletes the collection key and the detail key of a returned record", async () => {
      const [first] = makeArticles()
      const update = withManagerInvalidation(async () => first, manager)

      await update()

      expect(await liveKeys()).toStrictEqual(["article_2", "article_published", "author"])
    })

    it("does not read a bare number result as an identifier", async () => {
      const countDrafts = withManagerInvalidation(async () => 1, manager)

      await expect(countDrafts()).resolves.toBe(1)

      expect(await liveKeys()).toStrictEqual(["article_1", "article_2", "article_published", "author"])
    })

    it("drops the detail key of a returned identifier when told to", async () => {
      const remove = withManagerInvalidation(async (id: number) => id, manager, {
        identify: (id) => id,
      })

      await remove(2)

      expect(await liveKeys()).toStrictEqual(["article_1", "article_published", "author"])
    })

    it("drops only the collection key when nothing identifies a record", async () => {
      const bulk = withManagerInvalidation(async () => ({ updated: 3 }), manager)

      await bulk()

      expect(await liveKeys()).toStrictEqual(["article_1", "article_2", "article_published", "author"])
    })

    it("honours identify and additionalKeys", async () => {
      const publish = withManagerInvalidation(async (id: number) => ({ ok: true, id }), manager, {
        identify: (_result, id) => id,
        additionalKeys: ["article_published"],
      })

      await publish(1)

      expect(await liveKeys()).toStrictEqual(["article_2", "author"])
    })

    it("passes failures through and deletes nothing", async () => {
      const op = withManagerInvalidation(async (_id: number): Promise<number> => {
        throw new Error("constraint violated")
      }, manager)

      await expect(op(1)).rejects.toThrow("constraint violated")
      expect(await liveKeys()).toHaveLength(5)
    })

    describe("when deleting fails", () => {
      let target: MockProxy<InvalidationTarget>
      let logger: MockProxy<Logger>

      beforeEach(() => {
        logger = mock<Logger>()
        target = mock<InvalidationTarget>({ logger })
        target.collectionKey.mockReturnValue("article")
        target.detailKey.mockImplementation((id) => `article_${id}`)
        target.findIdentifier.mockReturnValue(1)
        target.invalidate.mockRejectedValue(new Error("connection reset"))
      })

      it("logs on the manager's logger and resolves", async () => {
        const op = withManagerInvalidation(async () => "done", target)

        expect(await op()).toBe("done")
        expect(logger.error).toHaveBeenCalledWith(
          "Cache invalidation failed; stale entries remain until they expire",
          expect.objectContaining({ keys: ["article", "article_1"] }),
        )
      })
    })
  })
})
