import { createAppContext } from "./app/create-context"

const context = await createAppContext()
const { logger } = context.core
const { service } = context.domains.articles

try {
  await context.start()

  const published = await service.listPublished(10)
  logger.info("Published articles", { count: published.length, ids: published.map((a) => a.id) })
} catch (err) {
  logger.error("Catalog run failed", { err })
  process.exitCode = 1
} finally {
  await context.stop()
}
