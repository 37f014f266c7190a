export {
  MemoryDataSource,
  type MemoryDataSourceOptions,
  type MemoryExecution,
} from "./adapters/memory/memory-data-source"
export { type MemoryRelation, memoryRelation } from "./adapters/memory/memory-relation"
export {
  PostgresDataSource,
  type PostgresDataSourceOptions,
} from "./adapters/postgres/postgres-data-source"
export { createPgPool, type PgQueryable, pgQueryable } from "./adapters/postgres/postgres-pool"
export type { PgBelongsTo, PgHasMany, PgRelation } from "./adapters/postgres/postgres-relation"
export {
  CacheManager,
  type CacheManagerDeps,
  type FetchCollectionOptions,
  type FetchDetailOptions,
} from "./core/cache-manager"
export { type ErrorKindTable, resolveErrorKind } from "./core/error-kinds"
export { QueryCacheError } from "./core/errors"
export {
  type CacheKeyInvalidationOptions,
  type InvalidationKeys,
  type InvalidationTarget,
  type ManagerInvalidationOptions,
  type Operation,
  withCacheKeyInvalidation,
  withManagerInvalidation,
} from "./core/invalidation"
export { type CacheNamespace, collectionKey, createCacheNamespace, detailKey } from "./core/key-builder"
export { resolveManagerConfig } from "./core/manager-config"
export { matchesCriteria } from "./core/query/criteria"
export { ExecutorDataSource } from "./core/query/executor-data-source"
export { ScopedQuery } from "./core/query/scoped-query"
export type {
  CachedCollectionEntry,
  CachedDetailEntry,
  CachedEntry,
} from "./ports/cached-entry"
export type { ComposableQuery } from "./ports/composable-query"
export type { Criteria, FieldCriterion, FieldPredicate, PredicateOperator } from "./ports/criteria"
export type { DataSource } from "./ports/data-source"
export type { CacheManagerConfig, ResolvedCacheManagerConfig } from "./ports/manager-config"
export type { QueryExecutor, QueryPlan, SortDirection, SortKey } from "./ports/query-plan"
export type { RecordId, RecordModel } from "./ports/record"
