import {
  type Criteria,
  type FieldPredicate,
  type PredicateOperator,
  predicateOperators,
} from "../../ports/criteria"

export type NormalizedCondition = {
  readonly field: string
  readonly op: PredicateOperator
  readonly value: unknown
}

function isOperator(key: string): key is PredicateOperator {
  return predicateOperators.some((op) => op === key)
}

/**
 * A criterion is a predicate when it is a plain object whose keys are all
 * operators. Anything else, including `Date` and arrays, is an equality
 * value.
 */
export function isFieldPredicate(value: unknown): value is FieldPredicate<unknown> {
  if (typeof value !== "object" || value === null) return false
  if (Object.getPrototypeOf(value) !== Object.prototype) return false

  const keys = Object.keys(value)

  return keys.length > 0 && keys.every(isOperator)
}

/**
 * Flatten criteria to field/operator/value triples. Fields set to
 * `undefined` and predicate operators set to `undefined` are skipped.
 */
export function normalizeCriteria<T>(criteria: Criteria<T>): NormalizedCondition[] {
  const out: NormalizedCondition[] = []

  for (const [field, criterion] of Object.entries(criteria)) {
    if (criterion === undefined) continue

    if (!isFieldPredicate(criterion)) {
      out.push({ field, op: "eq", value: criterion })
      continue
    }

    for (const op of predicateOperators) {
      const value = criterion[op]
      if (value !== undefined) out.push({ field, op, value })
    }
  }

  return out
}

function comparable(value: unknown): number | string | bigint | boolean | null | undefined {
  if (value instanceof Date) return value.getTime()

  if (
    typeof value === "number" ||
    typeof value === "string" ||
    typeof value === "bigint" ||
    typeof value === "boolean" ||
    value === null ||
    value === undefined
  ) {
    return value
  }

  return undefined
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()

  return false
}

/**
 * Ordering for sort and range operators. `null` and `undefined` sort first;
 * mismatched types compare by type name so sorting stays total.
 */
export function compareValues(a: unknown, b: unknown): number {
  const x = comparable(a)
  const y = comparable(b)

  if (x === y) return 0
  if (x === null || x === undefined) return -1
  if (y === null || y === undefined) return 1

  if (typeof x === "number" && typeof y === "number") return sign(x - y)
  if (typeof x === "string" && typeof y === "string") return x < y ? -1 : x > y ? 1 : 0
  if (typeof x === "bigint" && typeof y === "bigint") return x < y ? -1 : x > y ? 1 : 0
  if (typeof x === "boolean" && typeof y === "boolean") return Number(x) - Number(y)

  return typeof x < typeof y ? -1 : 1
}

function sign(n: number): number {
  return n < 0 ? -1 : n > 0 ? 1 : 0
}

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined
}

function evaluate(actual: unknown, { op, value }: NormalizedCondition): boolean {
  switch (op) {
    case "eq":
      return valuesEqual(actual, value)
    case "ne":
      return !valuesEqual(actual, value)
    case "in":
      return Array.isArray(value) && value.some((v) => valuesEqual(actual, v))
    case "lt":
      return isPresent(actual) && compareValues(actual, value) < 0
    case "lte":
      return isPresent(actual) && compareValues(actual, value) <= 0
    case "gt":
      return isPresent(actual) && compareValues(actual, value) > 0
    case "gte":
      return isPresent(actual) && compareValues(actual, value) >= 0
  }
}

export function matchesCriteria<T extends object>(row: T, criteria: Criteria<T>): boolean {
  return normalizeCriteria(criteria).every((condition) =>
    evaluate(Reflect.get(row, condition.field), condition),
  )
}
