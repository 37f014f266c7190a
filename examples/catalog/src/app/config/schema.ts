import type { Seconds } from "@shelf/cache"
import { type LogLevelName, logLevelNames } from "@shelf/logger"
import { z } from "zod"

export const envSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("catalog"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),

  CACHE_DRIVER: z.enum(["memory", "redis"]).default("memory"),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(10_000),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_KEY_PREFIX: z.string().default("catalog:"),
  REDIS_DELETE_BATCH_SIZE: z.coerce.number().int().positive().default(500),

  DATA_DRIVER: z.enum(["memory", "postgres"]).default("memory"),
  DATABASE_URL: z.string().default("postgres://localhost:5432/catalog"),
  DATA_SEED: z.stringbool().default(true),

  ARTICLE_LIST_TIMEOUT: z.coerce.number().positive().default(86_400),
  ARTICLE_DETAIL_TIMEOUT: z.coerce.number().positive().default(60),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
    serviceName: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  cache:
    | { driver: "memory"; maxEntries: number }
    | { driver: "redis"; url: string; keyPrefix: string; deleteBatchSize: number }

  /** `seed` fills the memory driver with starter authors and articles. */
  data: { driver: "memory"; seed: boolean } | { driver: "postgres"; url: string }

  articles: {
    listTimeout: Seconds
    detailTimeout: Seconds
  }
}
