import { BaseError, type ErrorCode, type ErrorContext } from "@shelf/errors"

export class QueryCacheError extends BaseError<ErrorCode> {
  static notFound(code: ErrorCode, context: ErrorContext): QueryCacheError {
    return new QueryCacheError("Record not found", { code, context })
  }

  static invalidConfiguration(report: string, cause?: unknown): QueryCacheError {
    return new QueryCacheError(`Invalid cache manager configuration:\n${report}`, {
      code: "invalid_configuration",
      context: { report },
      isOperational: false,
      ...(cause !== undefined && { cause }),
    })
  }

  static invalidIdentifier(field: string, value: unknown): QueryCacheError {
    return new QueryCacheError(`Identifier field "${field}" must hold a string or number`, {
      code: "invalid_identifier",
      context: { field, valueType: value === null ? "null" : typeof value },
      isOperational: false,
    })
  }

  static unknownRelation(relation: string, known: readonly string[]): QueryCacheError {
    return new QueryCacheError(`Unknown relation "${relation}"`, {
      code: "unknown_relation",
      context: { relation, known: [...known] },
      isOperational: false,
    })
  }

  static ambiguousCriteria(criteria: unknown): QueryCacheError {
    return new QueryCacheError("Criteria matched more than one record", {
      code: "ambiguous_criteria",
      context: { criteria },
    })
  }
}
