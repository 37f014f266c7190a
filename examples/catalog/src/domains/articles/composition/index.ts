import type { BytesCache, Clock } from "@shelf/cache"
import type { Logger } from "@shelf/logger"
import { CacheManager, type DataSource } from "@shelf/query-cache"
import type { AppConfig } from "../../../app/config"
import { type Article, articleModel } from "../model/article.model"
import { ArticleService } from "../services/article-service"
import type { ArticleStore } from "../services/article-store"

export type ArticleServices = {
  cache: CacheManager<Article>
  service: ArticleService
}

export type ArticleServicesDeps = {
  logger: Logger
  clock: Clock
  cacheStore: BytesCache
  source: DataSource<Article>
  store: ArticleStore
}

export function createArticleServices(config: AppConfig, deps: ArticleServicesDeps): ArticleServices {
  const logger = deps.logger.child({ module: "articles" })

  const cache = new CacheManager<Article>(
    { store: deps.cacheStore, dataSource: deps.source, logger, clock: deps.clock },
    {
      model: articleModel,
      cacheKey: "article",
      relatedObjects: ["author"],
      listTimeout: config.articles.listTimeout,
      detailTimeout: config.articles.detailTimeout,
      notFoundError: "article_missing",
    },
  )

  const service = new ArticleService({
    cache,
    store: deps.store,
    cacheStore: deps.cacheStore,
    clock: deps.clock,
    logger,
  })

  return { cache, service }
}
