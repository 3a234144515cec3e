import { BaseError } from "@confbind/errors"

export class ConfigurationLoadError extends BaseError<"configuration_load_failed"> {
  constructor(source: string, reason: string, cause?: unknown) {
    super(`Failed to load configuration source "${source}": ${reason}`, {
      code: "configuration_load_failed",
      context: { source },
      cause,
    })
  }
}

export class ConfigurationValidationError extends BaseError<"configuration_invalid"> {
  constructor(section: string, details: string, cause?: unknown) {
    super(`Configuration section "${section}" failed validation:\n${details}`, {
      code: "configuration_invalid",
      context: { section },
      cause,
    })
  }
}
