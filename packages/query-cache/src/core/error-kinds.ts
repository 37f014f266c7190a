import { type ErrorCode, isAppError } from "@shelf/errors"

export type ErrorKindTable<K> = Partial<Record<ErrorCode, K>>

/**
 * Map a thrown value to an integrator-defined kind (an HTTP status, a gRPC
 * code) by its error code. Unmapped codes and non-AppErrors get `fallback`.
 *
 * @example
 * ```ts
 * const status = resolveErrorKind(err, { not_found: 404, article_missing: 404 }, 500)
 * ```
 */
export function resolveErrorKind<K>(error: unknown, table: ErrorKindTable<K>, fallback: K): K {
  if (!isAppError(error)) return fallback

  return table[error.code] ?? fallback
}
