/**
 * Machine-readable error code, always lowercase snake case by convention
 * (`not_found`, `invalid_configuration`).
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error (keys, identifiers, inputs).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (a missing record, an unreachable
   * backend), `false` for programmer errors and broken invariants.
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
