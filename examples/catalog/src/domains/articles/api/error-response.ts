import { type SerializedError, serializeError, toAppError } from "@shelf/errors"
import { type ErrorKindTable, resolveErrorKind } from "@shelf/query-cache"

export const articleErrorStatus: ErrorKindTable<number> = {
  article_missing: 404,
  invalid_article: 400,
  slug_taken: 409,
  ambiguous_criteria: 409,
}

export type ErrorResponse = {
  status: number
  body: { error: Pick<SerializedError, "code" | "message" | "context"> }
}

/**
 * HTTP-shaped view of a thrown value. Unmapped errors become an opaque 500
 * so internals stay out of responses.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  const error = toAppError(err)
  const status = resolveErrorKind(error, articleErrorStatus, 500)

  if (status === 500) {
    return { status, body: { error: { code: "internal", message: "Internal error", context: {} } } }
  }

  const { code, message, context } = serializeError(error)

  return { status, body: { error: { code, message, context } } }
}
