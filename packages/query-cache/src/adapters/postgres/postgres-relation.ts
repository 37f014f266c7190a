import { compileLookup } from "./sql"
import type { PgQueryable } from "./postgres-pool"

type Row = Record<string, unknown>

/** Many-to-one: `row[localField]` references `table.targetColumn`. */
export type PgBelongsTo<T extends object> = {
  kind: "belongs-to"
  field: keyof T & string
  table: string
  localField: keyof T & string
  targetColumn?: string
  parse: (row: Row) => unknown
}

/** One-to-many: `table.foreignColumn` references the parent identifier. */
export type PgHasMany<T extends object> = {
  kind: "has-many"
  field: keyof T & string
  table: string
  foreignColumn: string
  orderBy?: string
  parse: (row: Row) => unknown
}

export type PgRelation<T extends object> = PgBelongsTo<T> | PgHasMany<T>

function distinctKeys(values: readonly unknown[]): unknown[] {
  return [...new Set(values.filter((v) => v !== null && v !== undefined))]
}

/**
 * Load one relation for a page of rows with a single `= any($1)` query and
 * attach it under `relation.field`. Missing parents attach `null`, missing
 * children an empty array.
 */
export async function attachRelation<T extends object>(
  client: PgQueryable,
  relation: PgRelation<T>,
  rows: readonly T[],
  identifierOf: (row: T) => unknown,
): Promise<T[]> {
  if (relation.kind === "belongs-to") {
    const keys = distinctKeys(rows.map((row) => Reflect.get(row, relation.localField)))
    const byKey = new Map<string, unknown>()

    if (keys.length > 0) {
      const target = relation.targetColumn ?? "id"
      const stmt = compileLookup(relation.table, target, keys)
      const { rows: found } = await client.query(stmt.text, stmt.values)

      for (const raw of found) byKey.set(String(raw[target]), relation.parse(raw))
    }

    return rows.map((row) => ({
      ...row,
      [relation.field]: byKey.get(String(Reflect.get(row, relation.localField))) ?? null,
    }))
  }

  const keys = distinctKeys(rows.map(identifierOf))
  const grouped = new Map<string, unknown[]>()

  if (keys.length > 0) {
    const stmt = compileLookup(
      relation.table,
      relation.foreignColumn,
      keys,
      relation.orderBy ?? relation.foreignColumn,
    )
    const { rows: found } = await client.query(stmt.text, stmt.values)

    for (const raw of found) {
      const key = String(raw[relation.foreignColumn])
      const list = grouped.get(key) ?? []
      list.push(relation.parse(raw))
      grouped.set(key, list)
    }
  }

  return rows.map((row) => ({
    ...row,
    [relation.field]: grouped.get(String(identifierOf(row))) ?? [],
  }))
}
