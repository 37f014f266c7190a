import { type MockProxy, mock } from "vitest-mock-extended"
import { emptyPlan, type QueryExecutor } from "../../../ports/query-plan"
import { type Article, createArticleSource } from "../../../tests/utils/article-fixtures"
import { ScopedQuery } from "../scoped-query"

describe("ScopedQuery", () => {
  describe("plan accumulation", () => {
    let executor: MockProxy<QueryExecutor<Article>>

    beforeEach(() => {
      executor = mock<QueryExecutor<Article>>()
      executor.rows.mockResolvedValue([])
      executor.count.mockResolvedValue(0)
      executor.identifiers.mockResolvedValue([])
    })

    it("does not execute until asked", () => {
      ScopedQuery.of(executor, emptyPlan<Article>()).filter({ status: "draft" }).orderBy("views")

      expect(executor.rows).not.toHaveBeenCalled()
    })

    it("returns a new query for each refinement", () => {
      const base = ScopedQuery.of(executor, emptyPlan<Article>())
      const filtered = base.filter({ status: "published" })

      expect(filtered).not.toBe(base)
      expect(base.plan.filters).toStrictEqual([])
      expect(filtered.plan.filters).toStrictEqual([{ status: "published" }])
    })

    it("appends sort keys with asc as the default direction", () => {
      const q = ScopedQuery.of(executor, emptyPlan<Article>()).orderBy("views", "desc").orderBy("id")

      expect(q.plan.order).toStrictEqual([
        { field: "views", direction: "desc" },
        { field: "id", direction: "asc" },
      ])
    })

    it("intersects repeated identifier scopes in the order of the latest call", () => {
      const q = ScopedQuery.of(executor, emptyPlan<Article>()).byIdentifiers([1, 2, 3]).byIdentifiers([3, 4, 1])

      expect(q.plan.identifiers).toStrictEqual([3, 1])
    })

    it("keeps the smaller of two limits", () => {
      const q = ScopedQuery.of(executor, emptyPlan<Article>()).limit(5).limit(10)

      expect(q.plan.limit).toBe(5)
    })

    it("rejects negative or fractional limits", () => {
      const q = ScopedQuery.of(executor, emptyPlan<Article>())

      expect(() => q.limit(-1)).toThrow(RangeError)
      expect(() => q.limit(1.5)).toThrow(RangeError)
    })

    it("short-circuits an empty identifier scope", async () => {
      const q = ScopedQuery.of(executor, emptyPlan<Article>()).byIdentifiers([])

      expect(await q.toArray()).toStrictEqual([])
      expect(await q.count()).toBe(0)
      expect(await q.identifiers()).toStrictEqual([])
      expect(executor.rows).not.toHaveBeenCalled()
      expect(executor.count).not.toHaveBeenCalled()
      expect(executor.identifiers).not.toHaveBeenCalled()
    })

    it("short-circuits a zero limit", async () => {
      expect(await ScopedQuery.of(executor, emptyPlan<Article>()).limit(0).toArray()).toStrictEqual([])
      expect(executor.rows).not.toHaveBeenCalled()
    })

    it("asks for a single row in first()", async () => {
      await ScopedQuery.of(executor, emptyPlan<Article>()).first()

      expect(executor.rows).toHaveBeenCalledWith(expect.objectContaining({ limit: 1 }))
    })
  })

  describe("against a memory source", () => {
    it("projects selected fields", async () => {
      const rows = await createArticleSource().query(undefined, []).select("id", "title").toArray()

      expect(rows).toStrictEqual([
        { id: 1, title: "Caching lists" },
        { id: 2, title: "Draft notes" },
        { id: 3, title: "Invalidation" },
      ])
    })

    it("narrows a projection further", async () => {
      const rows = await createArticleSource()
        .query(undefined, [])
        .select("id", "title")
        .select("id")
        .toArray()

      expect(rows).toStrictEqual([{ id: 1 }, { id: 2 }, { id: 3 }])
    })

    it("iterates asynchronously", async () => {
      const ids: number[] = []

      for await (const article of createArticleSource().query({ status: "published" }, [])) {
        ids.push(article.id)
      }

      expect(ids).toStrictEqual([1, 3])
    })
  })
})
