import type { MemoryDataSource } from "@shelf/query-cache"
import { ArticleError } from "../model/article.errors"
import type { Article, ArticlePatch, ArticleStatus, NewArticle } from "../model/article.model"
import type { ArticleStore } from "../services/article-store"

/** {@link ArticleStore} over the same in-process table the data source reads. */
export class MemoryArticleStore implements ArticleStore {
  constructor(private readonly source: MemoryDataSource<Article>) {}

  async create(input: NewArticle): Promise<Article> {
    await this.assertSlugFree(input.slug)

    const ids = await this.source.query(undefined, []).identifiers()
    const id = ids.reduce<number>((max, x) => (typeof x === "number" && x > max ? x : max), 0) + 1

    const article: Article = { id, ...input, status: "draft", publishedAt: null }
    this.source.insert(article)

    return { ...article }
  }

  async update(id: number, patch: ArticlePatch): Promise<Article | undefined> {
    if (patch.slug !== undefined) await this.assertSlugFree(patch.slug, id)

    return this.source.update(id, {
      ...(patch.title !== undefined && { title: patch.title }),
      ...(patch.slug !== undefined && { slug: patch.slug }),
    })
  }

  async setStatus(id: number, status: ArticleStatus, publishedAt: Date | null): Promise<Article | undefined> {
    return this.source.update(id, { status, publishedAt })
  }

  async unpublishByAuthor(authorId: number): Promise<number[]> {
    const rows = await this.source.query({ authorId, status: "published" }, []).toArray()

    for (const row of rows) this.source.update(row.id, { status: "draft", publishedAt: null })

    return rows.map((row) => row.id)
  }

  async remove(id: number): Promise<Article | undefined> {
    const [existing] = await this.source.query({ id }, []).toArray()

    if (existing !== undefined) this.source.remove(id)

    return existing
  }

  private async assertSlugFree(slug: string, self?: number): Promise<void> {
    const owner = await this.source.queryOne({ slug }, [])

    if (owner !== undefined && owner.id !== self) throw ArticleError.slugTaken(slug)
  }
}
