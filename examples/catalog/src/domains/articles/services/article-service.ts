import type { BytesCache, CacheKey, Clock } from "@shelf/cache"
import type { Logger } from "@shelf/logger"
import {
  type CacheManager,
  withCacheKeyInvalidation,
  withManagerInvalidation,
} from "@shelf/query-cache"
import { z } from "zod"
import { ArticleError } from "../model/article.errors"
import {
  type Article,
  articlePatchSchema,
  type NewArticle,
  newArticleSchema,
} from "../model/article.model"
import type { ArticleStore } from "./article-store"

export const PUBLISHED_SUFFIX = "published"

export function authorSuffix(authorId: number): string {
  return `author-${authorId}`
}

export type ArticleServiceDeps = {
  cache: CacheManager<Article>
  store: ArticleStore
  cacheStore: BytesCache
  clock: Clock
  logger: Logger
}

function parse<T>(schema: z.ZodType<T>, input: unknown): T {
  const result = schema.safeParse(input)

  if (!result.success) throw ArticleError.invalid(z.prettifyError(result.error))

  return result.data
}

/**
 * Article reads through the query cache, and writes that invalidate the
 * collection variants they can affect. Detail entries only hold an id and
 * are re-read on every hit, so they need dropping only when a row goes away.
 */
export class ArticleService {
  readonly create: (input: unknown) => Promise<Article>
  readonly update: (id: number, patch: unknown) => Promise<Article>
  readonly publish: (id: number) => Promise<Article>
  readonly unpublish: (id: number) => Promise<Article>
  readonly remove: (id: number) => Promise<Article>
  readonly unpublishAuthor: (authorId: number) => Promise<number[]>

  constructor(private readonly deps: ArticleServiceDeps) {
    const { cache, store } = deps
    const variants = { additionalKeys: (article: Article) => this.variantKeys(article.authorId) }

    this.create = withManagerInvalidation(
      async (input: unknown) => store.create(parse<NewArticle>(newArticleSchema, input)),
      cache,
      variants,
    )

    this.update = withManagerInvalidation(
      async (id: number, patch: unknown) =>
        this.found(id, await store.update(id, parse(articlePatchSchema, patch))),
      cache,
      variants,
    )

    this.publish = withManagerInvalidation(
      async (id: number) =>
        this.found(id, await store.setStatus(id, "published", this.deps.clock.now())),
      cache,
      variants,
    )

    this.unpublish = withManagerInvalidation(
      async (id: number) => this.found(id, await store.setStatus(id, "draft", null)),
      cache,
      variants,
    )

    this.remove = withManagerInvalidation(
      async (id: number) => this.found(id, await store.remove(id)),
      cache,
      variants,
    )

    this.unpublishAuthor = withCacheKeyInvalidation(
      (authorId: number) => store.unpublishByAuthor(authorId),
      deps.cacheStore,
      {
        keys: (_ids, authorId) => [cache.collectionKey(), ...this.variantKeys(authorId)],
        logger: deps.logger,
      },
    )
  }

  async list(): Promise<Article[]> {
    const query = await this.deps.cache.fetchCollection()

    return query.orderBy("id").toArray()
  }

  async listPublished(limit?: number): Promise<Article[]> {
    const query = await this.deps.cache.fetchCollection({
      suffix: PUBLISHED_SUFFIX,
      criteria: { status: "published" },
    })
    const newest = query.orderBy("publishedAt", "desc")

    return (limit === undefined ? newest : newest.limit(limit)).toArray()
  }

  async listByAuthor(authorId: number): Promise<Article[]> {
    const query = await this.deps.cache.fetchCollection({
      suffix: authorSuffix(authorId),
      criteria: { authorId },
    })

    return query.toArray()
  }

  async countPublished(): Promise<number> {
    const query = await this.deps.cache.fetchCollection({
      suffix: PUBLISHED_SUFFIX,
      criteria: { status: "published" },
    })

    return query.count()
  }

  /** Rejects with `article_missing` when there is no such article. */
  get(id: number): Promise<Article> {
    return this.deps.cache.fetchDetail(id, { id })
  }

  find(id: number): Promise<Article | null> {
    return this.deps.cache.fetchDetail(id, { id }, { raiseOnMissing: false })
  }

  private variantKeys(authorId: number): CacheKey[] {
    return [
      this.deps.cache.collectionKey(PUBLISHED_SUFFIX),
      this.deps.cache.collectionKey(authorSuffix(authorId)),
    ]
  }

  private found(id: number, article: Article | undefined): Article {
    if (article === undefined) throw ArticleError.missing(id)

    return article
  }
}
