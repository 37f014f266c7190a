import { BaseError } from "@shelf/errors"

export type ConfigErrorCode = "invalid_configuration" | "config_source_failed"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static validationFailed(report: string): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${report}`, {
      code: "invalid_configuration",
      context: { report },
      isOperational: false,
    })
  }

  static sourceFailed(source: string, cause: unknown): ConfigError {
    return new ConfigError(`Configuration source "${source}" failed to load`, {
      code: "config_source_failed",
      context: { source },
      cause,
    })
  }
}
