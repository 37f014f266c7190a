import type { Criteria } from "./criteria"
import type { RecordId } from "./record"

export type SortDirection = "asc" | "desc"

export type SortKey<T> = {
  readonly field: keyof T & string
  readonly direction: SortDirection
}

/**
 * Everything a composable query has accumulated so far. Executors turn a
 * plan into rows; nothing runs until they are asked to.
 */
export type QueryPlan<T> = {
  readonly filters: readonly Criteria<T>[]

  /**
   * Identifier scope. Without an explicit sort, results follow this
   * sequence.
   */
  readonly identifiers: readonly RecordId[] | null

  readonly order: readonly SortKey<T>[]
  readonly limit: number | null

  /** Relation names to load alongside each row. */
  readonly eagerLoad: readonly string[]
}

export interface QueryExecutor<T extends object> {
  /** Filtered, ordered, limited rows with eager loads attached. */
  rows(plan: QueryPlan<T>): Promise<T[]>

  count(plan: QueryPlan<T>): Promise<number>

  /** Identifiers of the rows `rows(plan)` would return, in the same order. */
  identifiers(plan: QueryPlan<T>): Promise<RecordId[]>
}

export function emptyPlan<T>(eagerLoad: readonly string[] = []): QueryPlan<T> {
  return { filters: [], identifiers: null, order: [], limit: null, eagerLoad }
}
