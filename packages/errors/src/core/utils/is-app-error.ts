import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural check for {@link AppError}. Errors crossing package boundaries
 * (or duplicated module instances) fail `instanceof`, so fields are checked.
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  const timestamp = e["timestamp"]

  return (
    typeof e["code"] === "string" &&
    typeof e["message"] === "string" &&
    typeof e["name"] === "string" &&
    isRecord(e["context"]) &&
    typeof e["isRetryable"] === "boolean" &&
    typeof e["isOperational"] === "boolean" &&
    timestamp instanceof Date &&
    Number.isFinite(timestamp.valueOf())
  )
}
