import type { ComposableQuery } from "./composable-query"
import type { Criteria } from "./criteria"

export interface DataSource<T extends object> {
  /** `criteria` undefined means every record. Nothing executes yet. */
  query(criteria: Criteria<T> | undefined, eagerLoad: readonly string[]): ComposableQuery<T>

  /**
   * The single record matching `criteria`, or `undefined`. More than one
   * match rejects with `ambiguous_criteria`.
   */
  queryOne(criteria: Criteria<T>, eagerLoad: readonly string[]): Promise<T | undefined>
}
