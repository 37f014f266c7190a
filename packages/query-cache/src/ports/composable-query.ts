import type { Criteria } from "./criteria"
import type { QueryPlan, SortDirection } from "./query-plan"
import type { RecordId } from "./record"

/**
 * Lazy, immutable query over records of type `T`, yielding `B` (a
 * projection of `T` once `select` has been applied).
 *
 * Every refinement returns a new query. Work only happens in the executing
 * methods and in async iteration, and always against the live data source.
 */
export interface ComposableQuery<T extends object, B extends object = T> extends AsyncIterable<B> {
  readonly plan: QueryPlan<T>

  filter(criteria: Criteria<T>): ComposableQuery<T, B>

  orderBy(field: keyof T & string, direction?: SortDirection): ComposableQuery<T, B>

  /**
   * Restrict to the given identifiers. Repeated calls intersect; without an
   * explicit `orderBy`, rows come back in the order of the latest sequence.
   */
  byIdentifiers(ids: readonly RecordId[]): ComposableQuery<T, B>

  select<K extends keyof B & string>(...fields: K[]): ComposableQuery<T, Pick<B, K>>

  limit(n: number): ComposableQuery<T, B>

  toArray(): Promise<B[]>

  first(): Promise<B | undefined>

  count(): Promise<number>

  identifiers(): Promise<RecordId[]>
}
