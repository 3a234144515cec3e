import type { CoercionError } from "../core/errors"

export type CoercionFailureReason =
  | "missing_value"
  | "invalid_format"
  | "out_of_range"
  | "unregistered_type"

export type SuccessfulCoercion<T> = {
  success: true
  value: T
}

export type FailedCoercion = {
  success: false
  error: CoercionError
}

export type CoercionResult<T> = SuccessfulCoercion<T> | FailedCoercion
