import { type AppConfig, loadAppConfig } from "./config"
import { createDomainServices, type DomainServices } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createInfraServices, type InfraServices } from "./services/infra"

export type AppContextOptions = {
  env?: Record<string, string | undefined>
  cwd?: string
  coreOverrides?: Partial<CoreServices>
  infraOverrides?: Partial<InfraServices>
}

export type AppContext = {
  config: AppConfig
  core: CoreServices
  infra: InfraServices
  domains: DomainServices

  /** Open connections to the configured backends. */
  start(): Promise<void>

  /** Close whatever `start` opened. Safe to call more than once. */
  stop(): Promise<void>
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = await loadAppConfig(options.env ?? process.env, options.cwd)

  const core = { ...createCoreServices(config), ...options.coreOverrides }
  const infra = { ...createInfraServices(config, core), ...options.infraOverrides }
  const domains = createDomainServices(config, core, infra)

  let pgPoolOpen = infra.pgPool !== null

  return {
    config,
    core,
    infra,
    domains,

    async start() {
      if (infra.redisClient !== null && !infra.redisClient.isOpen) {
        await infra.redisClient.connect()
      }

      core.logger.info("Catalog started", {
        cacheDriver: config.cache.driver,
        dataDriver: config.data.driver,
      })
    },

    async stop() {
      if (infra.redisClient?.isOpen) await infra.redisClient.close()

      if (infra.pgPool !== null && pgPoolOpen) {
        pgPoolOpen = false
        await infra.pgPool.end()
      }

      core.logger.info("Catalog stopped")
    },
  }
}
