import type { RecordModel } from "@shelf/query-cache"
import { z } from "zod"

export const articleStatuses = ["draft", "published"] as const

export type ArticleStatus = (typeof articleStatuses)[number]

export type Author = {
  id: number
  name: string
}

export type Article = {
  id: number
  slug: string
  title: string
  status: ArticleStatus
  authorId: number
  publishedAt: Date | null

  /** Present when loaded with the `author` relation. */
  author?: Author | null
}

export const articleModel: RecordModel<Article> = { name: "Article", identifier: "id" }

export const authorRowSchema = z.object({
  id: z.coerce.number().int(),
  name: z.string(),
})

export const articleRowSchema = z
  .object({
    id: z.coerce.number().int(),
    slug: z.string(),
    title: z.string(),
    status: z.enum(articleStatuses),
    author_id: z.coerce.number().int(),
    published_at: z.coerce.date().nullable(),
  })
  .transform(
    (row): Article => ({
      id: row.id,
      slug: row.slug,
      title: row.title,
      status: row.status,
      authorId: row.author_id,
      publishedAt: row.published_at,
    }),
  )

export const newArticleSchema = z.object({
  slug: z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, "Expected a lowercase, dash-separated slug"),
  title: z.string().trim().min(1),
  authorId: z.number().int().positive(),
})

export type NewArticle = z.infer<typeof newArticleSchema>

export const articlePatchSchema = newArticleSchema.pick({ title: true, slug: true }).partial()

export type ArticlePatch = z.infer<typeof articlePatchSchema>

