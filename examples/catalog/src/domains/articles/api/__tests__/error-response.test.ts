import { QueryCacheError } from "@shelf/query-cache"
import { ArticleError } from "../../model/article.errors"
import { toErrorResponse } from "../error-response"

describe("toErrorResponse", () => {
  it("maps a missing article to 404", () => {
    const res = toErrorResponse(QueryCacheError.notFound("article_missing", { model: "Article", identifier: 7 }))

    expect(res).toStrictEqual({
      status: 404,
      body: {
        error: {
          code: "article_missing",
          message: "Record not found",
          context: { model: "Article", identifier: 7 },
        },
      },
    })
  })

  it("maps a duplicate slug to 409", () => {
    const res = toErrorResponse(ArticleError.slugTaken("hello"))

    expect(res.status).toBe(409)
    expect(res.body.error).toStrictEqual({
      code: "slug_taken",
      message: 'Slug "hello" is already in use',
      context: { slug: "hello" },
    })
  })

  it("maps invalid input to 400", () => {
    expect(toErrorResponse(ArticleError.invalid("bad")).status).toBe(400)
  })

  it("hides unmapped errors behind an opaque 500", () => {
    expect(toErrorResponse(new Error("password authentication failed"))).toStrictEqual({
      status: 500,
      body: { error: { code: "internal", message: "Internal error", context: {} } },
    })
  })
})
