import { Pool } from "pg"

export type PgQueryable = {
  query: (sql: string, params?: unknown[]) => Promise<{ rows: Array<Record<string, unknown>> }>
}

export function createPgPool(options: { connectionString: string }): Pool {
  return new Pool({
    connectionString: options.connectionString,
  })
}

export function pgQueryable(pool: Pool): PgQueryable {
  return {
    query: async (sql, params) => {
      const result = await pool.query(sql, params)
      return { rows: result.rows }
    },
  }
}
