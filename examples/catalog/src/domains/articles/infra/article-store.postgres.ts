import type { PgQueryable } from "@shelf/query-cache"
import { ArticleError } from "../model/article.errors"
import {
  type Article,
  type ArticlePatch,
  type ArticleStatus,
  articleRowSchema,
  type NewArticle,
} from "../model/article.model"
import type { ArticleStore } from "../services/article-store"

const UNIQUE_VIOLATION = "23505"

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === UNIQUE_VIOLATION
}

export class PostgresArticleStore implements ArticleStore {
  constructor(private readonly client: PgQueryable) {}

  async create(input: NewArticle): Promise<Article> {
    const rows = await this.write(
      input.slug,
      `insert into "articles" ("slug", "title", "status", "author_id") values ($1, $2, 'draft', $3) returning *`,
      [input.slug, input.title, input.authorId],
    )
    const [article] = rows

    if (article === undefined) throw new Error("insert into articles returned no row")

    return article
  }

  async update(id: number, patch: ArticlePatch): Promise<Article | undefined> {
    const sets: string[] = []
    const values: unknown[] = []

    if (patch.title !== undefined) {
      values.push(patch.title)
      sets.push(`"title" = $${values.length}`)
    }
    if (patch.slug !== undefined) {
      values.push(patch.slug)
      sets.push(`"slug" = $${values.length}`)
    }

    if (sets.length === 0) {
      const { rows } = await this.client.query(`select * from "articles" where "id" = $1`, [id])
      return rows.map((row) => articleRowSchema.parse(row))[0]
    }

    values.push(id)
    const rows = await this.write(
      patch.slug,
      `update "articles" set ${sets.join(", ")} where "id" = $${values.length} returning *`,
      values,
    )

    return rows[0]
  }

  async setStatus(id: number, status: ArticleStatus, publishedAt: Date | null): Promise<Article | undefined> {
    const { rows } = await this.client.query(
      `update "articles" set "status" = $1, "published_at" = $2 where "id" = $3 returning *`,
      [status, publishedAt, id],
    )

    return rows.map((row) => articleRowSchema.parse(row))[0]
  }

  async unpublishByAuthor(authorId: number): Promise<number[]> {
    const { rows } = await this.client.query(
      `update "articles" set "status" = 'draft', "published_at" = null where "author_id" = $1 and "status" = 'published' returning "id"`,
      [authorId],
    )

    return rows.map((row) => Number(row["id"]))
  }

  async remove(id: number): Promise<Article | undefined> {
    const { rows } = await this.client.query(`delete from "articles" where "id" = $1 returning *`, [id])

    return rows.map((row) => articleRowSchema.parse(row))[0]
  }

  private async write(slug: string | undefined, sql: string, values: unknown[]): Promise<Article[]> {
    try {
      const { rows } = await this.client.query(sql, values)
      return rows.map((row) => articleRowSchema.parse(row))
    } catch (err) {
      if (slug !== undefined && isUniqueViolation(err)) throw ArticleError.slugTaken(slug)
      throw err
    }
  }
}
