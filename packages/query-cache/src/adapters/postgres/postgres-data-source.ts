import { ExecutorDataSource } from "../../core/query/executor-data-source"
import { QueryCacheError } from "../../core/errors"
import type { QueryExecutor, QueryPlan } from "../../ports/query-plan"
import type { RecordId, RecordModel } from "../../ports/record"
import type { PgQueryable } from "./postgres-pool"
import { attachRelation, type PgRelation } from "./postgres-relation"
import { compileCount, compileIdentifiers, compileSelect, type SqlTarget } from "./sql"

export type PostgresDataSourceOptions<T extends object> = {
  client: PgQueryable
  table: string
  model: RecordModel<T>

  /** Field → column. Fields not listed use their own name. */
  columns?: Partial<Record<keyof T & string, string>>

  /** Validate and map one row. Throwing rejects the query. */
  parse: (row: Record<string, unknown>) => T

  relations?: Readonly<Record<string, PgRelation<T>>>
}

/**
 * {@link DataSource} over a single PostgreSQL table. Plans compile to
 * parameterized SQL; eager loads run as one batched query per relation.
 */
export class PostgresDataSource<T extends object> extends ExecutorDataSource<T> {
  protected readonly executor: QueryExecutor<T>

  private readonly target: SqlTarget
  private readonly relations: Readonly<Record<string, PgRelation<T>>>

  constructor(private readonly opts: PostgresDataSourceOptions<T>) {
    super()

    const columns = opts.columns ?? {}
    const columnOf = (field: string): string => {
      const column: unknown = Reflect.get(columns, field)
      return typeof column === "string" ? column : field
    }

    this.relations = opts.relations ?? {}
    this.target = {
      table: opts.table,
      identifierColumn: columnOf(opts.model.identifier),
      columnOf,
    }
    this.executor = {
      rows: (plan) => this.rows(plan),
      count: (plan) => this.count(plan),
      identifiers: (plan) => this.identifiers(plan),
    }
  }

  private async rows(plan: QueryPlan<T>): Promise<T[]> {
    const relations = plan.eagerLoad.map((name) => {
      const relation = this.relations[name]
      if (relation === undefined) {
        throw QueryCacheError.unknownRelation(name, Object.keys(this.relations))
      }
      return relation
    })

    const stmt = compileSelect(this.target, plan)
    const { rows: raw } = await this.opts.client.query(stmt.text, stmt.values)

    let rows = raw.map((row) => this.opts.parse(row))

    for (const relation of relations) {
      rows = await attachRelation(this.opts.client, relation, rows, (row) =>
        Reflect.get(row, this.opts.model.identifier),
      )
    }

    return rows
  }

  private async count(plan: QueryPlan<T>): Promise<number> {
    const stmt = compileCount(this.target, plan)
    const { rows } = await this.opts.client.query(stmt.text, stmt.values)

    return Number(rows[0]?.["count"] ?? 0)
  }

  private async identifiers(plan: QueryPlan<T>): Promise<RecordId[]> {
    const stmt = compileIdentifiers(this.target, plan)
    const { rows } = await this.opts.client.query(stmt.text, stmt.values)

    return rows.map((row) => {
      const id = row[this.target.identifierColumn]

      if (typeof id !== "string" && typeof id !== "number") {
        throw QueryCacheError.invalidIdentifier(this.opts.model.identifier, id)
      }

      return id
    })
  }
}
