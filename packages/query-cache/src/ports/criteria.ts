export const predicateOperators = ["eq", "ne", "lt", "lte", "gt", "gte", "in"] as const

export type PredicateOperator = (typeof predicateOperators)[number]

export type FieldPredicate<V> = {
  eq?: V
  ne?: V
  lt?: V
  lte?: V
  gt?: V
  gte?: V
  in?: readonly V[]
}

/** A bare value means equality. */
export type FieldCriterion<V> = V | FieldPredicate<V>

/**
 * Per-field conditions, combined with AND. Chained `filter` calls AND
 * together as well.
 *
 * @example
 * ```ts
 * const criteria: Criteria<Article> = { status: "published", views: { gte: 100 } }
 * ```
 */
export type Criteria<T> = {
  readonly [K in keyof T]?: FieldCriterion<T[K]> | undefined
}
