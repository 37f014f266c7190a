import { normalizeCriteria, type NormalizedCondition } from "../../core/query/criteria"
import type { QueryPlan } from "../../ports/query-plan"

export type SqlStatement = {
  text: string
  values: unknown[]
}

export type SqlTarget = {
  table: string
  identifierColumn: string
  columnOf: (field: string) => string
}

export function quoteIdent(name: string): string {
  return `"${name.replaceAll('"', '""')}"`
}

class Params {
  readonly values: unknown[] = []

  add(value: unknown): string {
    this.values.push(value)
    return `$${this.values.length}`
  }
}

const RANGE_OPERATORS = { lt: "<", lte: "<=", gt: ">", gte: ">=" } as const

function compileCondition(column: string, { op, value }: NormalizedCondition, params: Params): string {
  switch (op) {
    case "eq":
      return value === null ? `${column} is null` : `${column} = ${params.add(value)}`
    case "ne":
      return value === null
        ? `${column} is not null`
        : `${column} is distinct from ${params.add(value)}`
    case "in":
      return `${column} = any(${params.add(value)})`
    case "lt":
    case "lte":
    case "gt":
    case "gte":
      return `${column} ${RANGE_OPERATORS[op]} ${params.add(value)}`
  }
}

/**
 * Shared tail of every statement: `from`, `where`, `order by`, `limit`.
 *
 * Without an explicit sort, an identifier scope orders by position in the
 * identifier array (reusing its parameter) and anything else orders by the
 * identifier column, so results are deterministic.
 */
function compileScope<T>(
  target: SqlTarget,
  plan: QueryPlan<T>,
  params: Params,
  { ordered }: { ordered: boolean },
): string {
  const idColumn = quoteIdent(target.identifierColumn)
  const where: string[] = []
  let idsParam: string | undefined

  for (const criteria of plan.filters) {
    for (const condition of normalizeCriteria(criteria)) {
      where.push(compileCondition(quoteIdent(target.columnOf(condition.field)), condition, params))
    }
  }

  if (plan.identifiers !== null) {
    idsParam = params.add([...plan.identifiers])
    where.push(`${idColumn} = any(${idsParam})`)
  }

  let sql = `from ${quoteIdent(target.table)}`
  if (where.length > 0) sql += ` where ${where.join(" and ")}`

  if (ordered) {
    const order =
      plan.order.length > 0
        ? plan.order.map((s) => `${quoteIdent(target.columnOf(s.field))} ${s.direction}`)
        : idsParam !== undefined
          ? [`array_position(${idsParam}, ${idColumn})`]
          : [`${idColumn} asc`]

    sql += ` order by ${order.join(", ")}`
  }

  if (plan.limit !== null) sql += ` limit ${params.add(plan.limit)}`

  return sql
}

export function compileSelect<T>(target: SqlTarget, plan: QueryPlan<T>): SqlStatement {
  const params = new Params()
  const text = `select * ${compileScope(target, plan, params, { ordered: true })}`

  return { text, values: params.values }
}

export function compileIdentifiers<T>(target: SqlTarget, plan: QueryPlan<T>): SqlStatement {
  const params = new Params()
  const scope = compileScope(target, plan, params, { ordered: true })

  return { text: `select ${quoteIdent(target.identifierColumn)} ${scope}`, values: params.values }
}

export function compileCount<T>(target: SqlTarget, plan: QueryPlan<T>): SqlStatement {
  const params = new Params()

  if (plan.limit === null) {
    const scope = compileScope(target, plan, params, { ordered: false })
    return { text: `select count(*)::int as count ${scope}`, values: params.values }
  }

  const scope = compileScope(target, plan, params, { ordered: false })

  return {
    text: `select count(*)::int as count from (select 1 ${scope}) as scoped`,
    values: params.values,
  }
}

/** `select * from <table> where <column> = any($1) order by <orderBy>` */
export function compileLookup(
  table: string,
  column: string,
  keys: readonly unknown[],
  orderBy?: string,
): SqlStatement {
  const order = orderBy === undefined ? "" : ` order by ${quoteIdent(orderBy)} asc`

  return {
    text: `select * from ${quoteIdent(table)} where ${quoteIdent(column)} = any($1)${order}`,
    values: [[...keys]],
  }
}
