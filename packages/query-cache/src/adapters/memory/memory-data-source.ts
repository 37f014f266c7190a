import { compareValues, matchesCriteria } from "../../core/query/criteria"
import { ExecutorDataSource } from "../../core/query/executor-data-source"
import { QueryCacheError } from "../../core/errors"
import type { QueryExecutor, QueryPlan } from "../../ports/query-plan"
import type { RecordId, RecordModel } from "../../ports/record"
import type { MemoryRelation } from "./memory-relation"

export type MemoryExecution<T> = {
  kind: "rows" | "count" | "identifiers"
  plan: QueryPlan<T>
}

export type MemoryDataSourceOptions<T extends object> = {
  model: RecordModel<T>
  relations?: Readonly<Record<string, MemoryRelation<T>>>
  records?: readonly T[]
}

/**
 * In-process table keyed by the model's identifier. Rows come back as
 * shallow copies in insertion order unless sorted or scoped by identifiers.
 *
 * Every execution is recorded in {@link executions}, which makes it the
 * stand-in of choice when asserting how often a cache reached its source.
 */
export class MemoryDataSource<T extends object> extends ExecutorDataSource<T> {
  readonly executions: MemoryExecution<T>[] = []

  protected readonly executor: QueryExecutor<T>

  private readonly table = new Map<RecordId, T>()
  private readonly relations: Readonly<Record<string, MemoryRelation<T>>>

  constructor(private readonly opts: MemoryDataSourceOptions<T>) {
    super()

    this.relations = opts.relations ?? {}
    this.executor = {
      rows: (plan) => this.rows(plan),
      count: async (plan) => (await this.scan(plan, "count")).length,
      identifiers: async (plan) => (await this.scan(plan, "identifiers")).map((r) => this.idOf(r)),
    }

    for (const record of opts.records ?? []) this.insert(record)
  }

  get executionCount(): number {
    return this.executions.length
  }

  get size(): number {
    return this.table.size
  }

  /** Insert or replace by identifier. */
  insert(record: T): void {
    this.table.set(this.idOf(record), { ...record })
  }

  /** Merge `patch` into an existing record. Returns the updated copy. */
  update(id: RecordId, patch: Partial<T>): T | undefined {
    const current = this.table.get(id)
    if (current === undefined) return undefined

    const next: T = { ...current, ...patch }
    this.table.set(id, next)

    return { ...next }
  }

  remove(id: RecordId): boolean {
    return this.table.delete(id)
  }

  private idOf(record: T): RecordId {
    const field = this.opts.model.identifier
    const id: unknown = Reflect.get(record, field)

    if (typeof id !== "string" && typeof id !== "number") {
      throw QueryCacheError.invalidIdentifier(field, id)
    }

    return id
  }

  private async rows(plan: QueryPlan<T>): Promise<T[]> {
    let rows = await this.scan(plan, "rows")

    for (const name of plan.eagerLoad) {
      const relation = this.relations[name]
      if (relation === undefined) {
        throw QueryCacheError.unknownRelation(name, Object.keys(this.relations))
      }

      rows = await relation.attach(rows)
    }

    return rows
  }

  private async scan(plan: QueryPlan<T>, kind: MemoryExecution<T>["kind"]): Promise<T[]> {
    this.executions.push({ kind, plan })

    let rows = [...this.table.values()].filter((row) =>
      plan.filters.every((criteria) => matchesCriteria(row, criteria)),
    )

    if (plan.identifiers !== null) {
      const position = new Map<RecordId, number>(plan.identifiers.map((id, i) => [id, i]))

      rows = rows.filter((row) => position.has(this.idOf(row)))

      if (plan.order.length === 0) {
        rows.sort((a, b) => (position.get(this.idOf(a)) ?? 0) - (position.get(this.idOf(b)) ?? 0))
      }
    }

    if (plan.order.length > 0) {
      rows.sort((a, b) => {
        for (const { field, direction } of plan.order) {
          const cmp = compareValues(Reflect.get(a, field), Reflect.get(b, field))
          if (cmp !== 0) return direction === "asc" ? cmp : -cmp
        }
        return 0
      })
    }

    if (plan.limit !== null) rows = rows.slice(0, plan.limit)

    return rows.map((row) => ({ ...row }))
  }
}
