import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { loadAppConfig } from "../load-app-config"

describe("loadAppConfig", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "catalog-config-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("applies defaults", async () => {
    expect(await loadAppConfig({}, cwd)).toStrictEqual({
      app: { env: "development", serviceName: "catalog" },
      logging: { level: "info", prettify: false },
      cache: { driver: "memory", maxEntries: 10_000 },
      data: { driver: "memory", seed: true },
      articles: { listTimeout: 86_400, detailTimeout: 60 },
    })
  })

  it("maps the redis and postgres drivers", async () => {
    const config = await loadAppConfig(
      {
        CACHE_DRIVER: "redis",
        REDIS_URL: "redis://cache:6379",
        REDIS_KEY_PREFIX: "test:",
        DATA_DRIVER: "postgres",
        DATABASE_URL: "postgres://db:5432/test",
      },
      cwd,
    )

    expect(config.cache).toStrictEqual({
      driver: "redis",
      url: "redis://cache:6379",
      keyPrefix: "test:",
      deleteBatchSize: 500,
    })
    expect(config.data).toStrictEqual({ driver: "postgres", url: "postgres://db:5432/test" })
  })

  it("coerces numbers and booleans from strings", async () => {
    const config = await loadAppConfig(
      { LOG_PRETTY: "true", ARTICLE_LIST_TIMEOUT: "30", CACHE_MAX_ENTRIES: "25" },
      cwd,
    )

    expect(config.logging.prettify).toBe(true)
    expect(config.articles.listTimeout).toBe(30)
    expect(config.cache).toStrictEqual({ driver: "memory", maxEntries: 25 })
    expect(config.data).toStrictEqual({ driver: "memory", seed: true })
  })

  it("reads the dotenv file for NODE_ENV, with the environment taking precedence", async () => {
    await fs.writeFile(
      path.join(cwd, ".env.test"),
      "ARTICLE_DETAIL_TIMEOUT=15\nARTICLE_LIST_TIMEOUT=45\n",
    )

    const config = await loadAppConfig({ NODE_ENV: "test", ARTICLE_LIST_TIMEOUT: "90" }, cwd)

    expect(config.articles).toStrictEqual({ listTimeout: 90, detailTimeout: 15 })
  })

  it("rejects invalid values", async () => {
    await expect(loadAppConfig({ CACHE_DRIVER: "memcached" }, cwd)).rejects.toMatchObject({
      code: "invalid_configuration",
    })
  })
})
