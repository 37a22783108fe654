import { BaseError } from "@bincanon/errors"

export class ConfigError extends BaseError<"config_validation_failed"> {
  static validationFailed(details: string, issues: number): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_validation_failed",
      context: { issues },
      isOperational: false,
    })
  }
}
