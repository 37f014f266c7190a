import {
  type BytesCache,
  createRedisBytesClient,
  MemoryBytesCache,
  RedisBytesCache,
  type RedisBytesClient,
} from "@shelf/cache"
import { createPgPool, type DataSource, pgQueryable } from "@shelf/query-cache"
import type { Pool } from "pg"
import { seedArticles, seedAuthors } from "../../domains/articles/infra/article-seed"
import { createMemoryArticleSource } from "../../domains/articles/infra/article-source.memory"
import { createPostgresArticleSource } from "../../domains/articles/infra/article-source.postgres"
import { MemoryArticleStore } from "../../domains/articles/infra/article-store.memory"
import { PostgresArticleStore } from "../../domains/articles/infra/article-store.postgres"
import type { Article } from "../../domains/articles/model/article.model"
import type { ArticleStore } from "../../domains/articles/services/article-store"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraServices = {
  cacheStore: BytesCache
  redisClient: RedisBytesClient | null
  pgPool: Pool | null
  articleSource: DataSource<Article>
  articleStore: ArticleStore
}

function createCacheStore(
  config: AppConfig,
  core: CoreServices,
): Pick<InfraServices, "cacheStore" | "redisClient"> {
  if (config.cache.driver === "memory") {
    return {
      cacheStore: new MemoryBytesCache({ clock: core.clock }, { maxEntries: config.cache.maxEntries }),
      redisClient: null,
    }
  }

  const redisClient = createRedisBytesClient(config.cache.url)

  return {
    cacheStore: new RedisBytesCache(redisClient, {
      batchSize: config.cache.deleteBatchSize,
      keyspacePrefix: config.cache.keyPrefix,
    }),
    redisClient,
  }
}

function createArticleData(
  config: AppConfig,
): Pick<InfraServices, "articleSource" | "articleStore" | "pgPool"> {
  if (config.data.driver === "memory") {
    const source = config.data.seed
      ? createMemoryArticleSource(seedAuthors, seedArticles())
      : createMemoryArticleSource()

    return { articleSource: source, articleStore: new MemoryArticleStore(source), pgPool: null }
  }

  const pgPool = createPgPool({ connectionString: config.data.url })
  const client = pgQueryable(pgPool)

  return {
    articleSource: createPostgresArticleSource(client),
    articleStore: new PostgresArticleStore(client),
    pgPool,
  }
}

export function createInfraServices(config: AppConfig, core: CoreServices): InfraServices {
  return {
    ...createCacheStore(config, core),
    ...createArticleData(config),
  }
}
