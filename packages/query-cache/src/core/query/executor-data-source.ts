import type { ComposableQuery } from "../../ports/composable-query"
import type { Criteria } from "../../ports/criteria"
import type { DataSource } from "../../ports/data-source"
import { emptyPlan, type QueryExecutor } from "../../ports/query-plan"
import { QueryCacheError } from "../errors"
import { ScopedQuery } from "./scoped-query"

/**
 * Shared {@link DataSource} behaviour for sources backed by a
 * {@link QueryExecutor}: queries are {@link ScopedQuery} instances, and
 * `queryOne` fetches at most two rows to detect ambiguity.
 */
export abstract class ExecutorDataSource<T extends object> implements DataSource<T> {
  protected abstract readonly executor: QueryExecutor<T>

  query(criteria: Criteria<T> | undefined, eagerLoad: readonly string[]): ComposableQuery<T> {
    const base = ScopedQuery.of(this.executor, emptyPlan<T>([...new Set(eagerLoad)]))

    return criteria === undefined ? base : base.filter(criteria)
  }

  async queryOne(criteria: Criteria<T>, eagerLoad: readonly string[]): Promise<T | undefined> {
    const rows = await this.query(criteria, eagerLoad).limit(2).toArray()

    if (rows.length > 1) throw QueryCacheError.ambiguousCriteria(criteria)

    return rows[0]
  }
}
