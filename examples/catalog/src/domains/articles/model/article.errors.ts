import { BaseError } from "@shelf/errors"
import type { RecordId } from "@shelf/query-cache"

export type ArticleErrorCode = "article_missing" | "invalid_article" | "slug_taken"

export class ArticleError extends BaseError<ArticleErrorCode> {
  static missing(id: RecordId): ArticleError {
    return new ArticleError(`Article ${id} does not exist`, {
      code: "article_missing",
      context: { id },
    })
  }

  static invalid(report: string): ArticleError {
    return new ArticleError(`Invalid article:\n${report}`, {
      code: "invalid_article",
      context: { report },
    })
  }

  static slugTaken(slug: string): ArticleError {
    return new ArticleError(`Slug "${slug}" is already in use`, {
      code: "slug_taken",
      context: { slug },
    })
  }
}
