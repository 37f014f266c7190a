/**
 * Eager load for {@link MemoryDataSource}: receives the rows of one
 * execution and returns them with the relation attached.
 */
export type MemoryRelation<T extends object> = {
  attach(rows: readonly T[]): T[] | Promise<T[]>
}

/**
 * Relation that sets `field` on each row from `load(row)`.
 *
 * @example
 * ```ts
 * const author = memoryRelation<Article, "author">("author", (a) => authors.get(a.authorId) ?? null)
 * ```
 */
export function memoryRelation<T extends object, K extends keyof T & string>(
  field: K,
  load: (row: T) => T[K],
): MemoryRelation<T> {
  return {
    attach: (rows) => rows.map((row) => ({ ...row, [field]: load(row) })),
  }
}
