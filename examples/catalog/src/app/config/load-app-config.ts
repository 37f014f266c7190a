import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@shelf/config"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    cache:
      env.CACHE_DRIVER === "redis"
        ? {
            driver: "redis",
            url: env.REDIS_URL,
            keyPrefix: env.REDIS_KEY_PREFIX,
            deleteBatchSize: env.REDIS_DELETE_BATCH_SIZE,
          }
        : { driver: "memory", maxEntries: env.CACHE_MAX_ENTRIES },
    data:
      env.DATA_DRIVER === "postgres"
        ? { driver: "postgres", url: env.DATABASE_URL }
        : { driver: "memory", seed: env.DATA_SEED },
    articles: {
      listTimeout: env.ARTICLE_LIST_TIMEOUT,
      detailTimeout: env.ARTICLE_DETAIL_TIMEOUT,
    },
  }
}

export async function loadAppConfig(
  env: Record<string, string | undefined>,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${env.NODE_ENV ?? "development"}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
