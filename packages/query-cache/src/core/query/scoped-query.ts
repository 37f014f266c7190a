import type { ComposableQuery } from "../../ports/composable-query"
import type { Criteria } from "../../ports/criteria"
import type { QueryExecutor, QueryPlan, SortDirection } from "../../ports/query-plan"
import type { RecordId } from "../../ports/record"

function pick<B extends object, K extends keyof B & string>(row: B, fields: readonly K[]): Pick<B, K> {
  const keep = new Set<string>(fields)
  const out: Pick<B, K> = { ...row }

  for (const key of Object.keys(out)) {
    if (!keep.has(key)) Reflect.deleteProperty(out, key)
  }

  return out
}

function intersect(current: readonly RecordId[] | null, next: readonly RecordId[]): RecordId[] {
  if (current === null) return [...next]

  const allowed = new Set(current)

  return next.filter((id) => allowed.has(id))
}

/**
 * {@link ComposableQuery} that accumulates a {@link QueryPlan} and hands it
 * to a {@link QueryExecutor} when a result is asked for.
 */
export class ScopedQuery<T extends object, B extends object = T> implements ComposableQuery<T, B> {
  private constructor(
    private readonly executor: QueryExecutor<T>,
    readonly plan: QueryPlan<T>,
    private readonly project: (row: T) => B,
  ) {}

  static of<T extends object>(executor: QueryExecutor<T>, plan: QueryPlan<T>): ScopedQuery<T> {
    return new ScopedQuery<T, T>(executor, plan, (row) => row)
  }

  filter(criteria: Criteria<T>): ScopedQuery<T, B> {
    return this.with({ filters: [...this.plan.filters, criteria] })
  }

  orderBy(field: keyof T & string, direction: SortDirection = "asc"): ScopedQuery<T, B> {
    return this.with({ order: [...this.plan.order, { field, direction }] })
  }

  byIdentifiers(ids: readonly RecordId[]): ScopedQuery<T, B> {
    return this.with({ identifiers: intersect(this.plan.identifiers, ids) })
  }

  select<K extends keyof B & string>(...fields: K[]): ScopedQuery<T, Pick<B, K>> {
    const project = this.project

    return new ScopedQuery(this.executor, this.plan, (row: T) => pick(project(row), fields))
  }

  limit(n: number): ScopedQuery<T, B> {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`limit must be a non-negative integer, got ${n}`)
    }

    const limit = this.plan.limit === null ? n : Math.min(this.plan.limit, n)

    return this.with({ limit })
  }

  async toArray(): Promise<B[]> {
    if (this.isEmpty()) return []

    const rows = await this.executor.rows(this.plan)

    return rows.map(this.project)
  }

  async first(): Promise<B | undefined> {
    const [row] = await this.limit(1).toArray()

    return row
  }

  async count(): Promise<number> {
    if (this.isEmpty()) return 0

    return this.executor.count(this.plan)
  }

  async identifiers(): Promise<RecordId[]> {
    if (this.isEmpty()) return []

    return this.executor.identifiers(this.plan)
  }

  async *[Symbol.asyncIterator](): AsyncIterator<B> {
    for (const row of await this.toArray()) {
      yield row
    }
  }

  /** An empty identifier scope or a zero limit can never match. */
  private isEmpty(): boolean {
    return this.plan.identifiers?.length === 0 || this.plan.limit === 0
  }

  private with(patch: Partial<QueryPlan<T>>): ScopedQuery<T, B> {
    return new ScopedQuery(this.executor, { ...this.plan, ...patch }, this.project)
  }
}
