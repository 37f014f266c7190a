import { type PgQueryable, PostgresDataSource } from "@shelf/query-cache"
import { type Article, articleModel, articleRowSchema, authorRowSchema } from "../model/article.model"

export const ARTICLES_TABLE = "articles"
export const AUTHORS_TABLE = "authors"

export function createPostgresArticleSource(client: PgQueryable): PostgresDataSource<Article> {
  return new PostgresDataSource<Article>({
    client,
    table: ARTICLES_TABLE,
    model: articleModel,
    columns: { authorId: "author_id", publishedAt: "published_at" },
    parse: (row) => articleRowSchema.parse(row),
    relations: {
      author: {
        kind: "belongs-to",
        field: "author",
        table: AUTHORS_TABLE,
        localField: "authorId",
        parse: (row) => authorRowSchema.parse(row),
      },
    },
  })
}
