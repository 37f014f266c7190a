import type { Article, ArticlePatch, ArticleStatus, NewArticle } from "../model/article.model"

/**
 * Write side of the article catalog. Reads go through the cache manager and
 * its data source; every method here changes rows and nothing else.
 */
export interface ArticleStore {
  /** New articles start as drafts. Rejects with `slug_taken` on a duplicate slug. */
  create(input: NewArticle): Promise<Article>

  update(id: number, patch: ArticlePatch): Promise<Article | undefined>

  setStatus(id: number, status: ArticleStatus, publishedAt: Date | null): Promise<Article | undefined>

  /** Move every published article by `authorId` back to draft. Returns the affected ids. */
  unpublishByAuthor(authorId: number): Promise<number[]>

  remove(id: number): Promise<Article | undefined>
}
