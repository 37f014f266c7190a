import { type ArticleServices, createArticleServices } from "../../domains/articles/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraServices } from "./infra"

export type DomainServices = {
  articles: ArticleServices
}

export function createDomainServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraServices,
): DomainServices {
  const articles = createArticleServices(config, {
    logger: core.logger,
    clock: core.clock,
    cacheStore: infra.cacheStore,
    source: infra.articleSource,
    store: infra.articleStore,
  })

  return { articles }
}
