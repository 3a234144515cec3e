import type { ConfigurationProvider } from "@confbind/config"
import type { CoercionResult } from "./coercion-result"
import type { ElementTarget, TargetType } from "./target-type"

/**
 * What to do when a leaf value is missing or cannot be converted.
 *
 * - `"default"`: log a warning and use the target's default value
 * - `"throw"`: throw the CoercionError
 */
export type CoercionErrorPolicy = "default" | "throw"

export type ValueResolverOptions = {
  /** @default "default" */
  onCoercionError?: CoercionErrorPolicy
}

export interface IValueResolver {
  /**
   * Reads the value at `key` (or the children under it, for collection
   * targets) and converts it to the target type.
   *
   * Errors thrown by the provider propagate.
   */
  resolve<T>(key: string, target: TargetType<T>, provider: ConfigurationProvider): T

  /**
   * Converts one raw value without applying the error policy.
   *
   * @param key - Used in diagnostics only.
   */
  coerce<T>(target: ElementTarget<T>, raw: string | undefined, key?: string): CoercionResult<T>
}
