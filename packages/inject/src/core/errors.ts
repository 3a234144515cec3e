import { BaseError } from "@confbind/errors"
import type { CoercionFailureReason } from "../ports/coercion-result"

const REASON_TEXT: Record<CoercionFailureReason, string> = {
  missing_value: "no value is configured",
  invalid_format: "the value is not in a valid format",
  out_of_range: "the value is out of range",
  unregistered_type: "the type is not registered",
}

export class CoercionError extends BaseError<"coercion_failed"> {
  readonly reason: CoercionFailureReason

  constructor(
    key: string,
    targetType: string,
    reason: CoercionFailureReason,
    cause?: unknown,
  ) {
    super(
      `Cannot convert configuration value at "${key}" to ${targetType}: ${REASON_TEXT[reason]}`,
      {
        code: "coercion_failed",
        context: { key, targetType, reason },
        cause,
      },
    )
    this.reason = reason
  }
}

export class ServiceNotRegisteredError extends BaseError<"service_not_registered"> {
  constructor(service: string) {
    super(`No service is registered for "${service}"`, {
      code: "service_not_registered",
      context: { service },
    })
  }
}

export class ServiceAlreadyRegisteredError extends BaseError<"service_already_registered"> {
  constructor(service: string) {
    super(`A service is already registered for "${service}"`, {
      code: "service_already_registered",
      context: { service },
    })
  }
}

export class CircularDependencyError extends BaseError<"circular_dependency"> {
  constructor(service: string) {
    super(`Service "${service}" depends on itself`, {
      code: "circular_dependency",
      context: { service },
      isOperational: false,
    })
  }
}

/**
 * A target or value type that cannot be used: an enum without members, a
 * value type registered twice, an empty binding key.
 */
export class InvalidTargetTypeError extends BaseError<"invalid_target_type"> {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, {
      code: "invalid_target_type",
      context,
      isOperational: false,
    })
  }
}
