import { MemoryDataSource, memoryRelation } from "@shelf/query-cache"
import { type Article, type Author, articleModel } from "../model/article.model"

export function createMemoryArticleSource(
  authors: readonly Author[] = [],
  articles: readonly Article[] = [],
): MemoryDataSource<Article> {
  const byId = new Map(authors.map((a) => [a.id, a]))

  return new MemoryDataSource<Article>({
    model: articleModel,
    records: articles,
    relations: {
      author: memoryRelation<Article, "author">("author", (a) => byId.get(a.authorId) ?? null),
    },
  })
}
