import type { ConfigurationProvider } from "@confbind/config"
import { type Logger, NullLogger } from "@confbind/logger"
import type { CoercionFailureReason, CoercionResult } from "../ports/coercion-result"
import type { ElementTarget, LeafTarget, TargetType } from "../ports/target-type"
import type {
  CoercionErrorPolicy,
  IValueResolver,
  ValueResolverOptions,
} from "../ports/value-resolver"
import { assertNever } from "./assert-never"
import { CoercionError } from "./errors"
import { parseEnum } from "./parsers/parse-enum"
import { describeTarget } from "./targets"
import { createValueTypeRegistry, type ValueTypeRegistry } from "./value-type-registry"
import { ValueTypes } from "./value-types"

export type ValueResolverDeps = {
  registry?: ValueTypeRegistry
  logger?: Logger
}

/**
 * Converts raw configuration values to typed scalars and collections.
 *
 * Resolution is synchronous and keeps no state between calls: resolving the
 * same key against an unchanged provider always yields an equal value.
 */
export class ValueResolver implements IValueResolver {
  private readonly registry: ValueTypeRegistry
  private readonly logger: Logger
  private readonly policy: CoercionErrorPolicy

  constructor(deps: ValueResolverDeps = {}, opts: ValueResolverOptions = {}) {
    this.registry = deps.registry ?? createValueTypeRegistry()
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "value-resolver" })
    this.policy = opts.onCoercionError ?? "default"
  }

  resolve<T>(key: string, target: TargetType<T>, provider: ConfigurationProvider): T {
    switch (target.shape) {
      case "readOnlyList":
      case "array":
      case "list":
        return target.materialize(provider.getChildren(key), (element, child) =>
          this.coerceOrDefault(element, child.value, child.path),
        )
      case "scalar":
      case "enum":
      case "nullable":
        return this.coerceOrDefault(target, provider.get(key), key)
      default:
        return assertNever(target)
    }
  }

  coerce<T>(target: ElementTarget<T>, raw: string | undefined, key = ""): CoercionResult<T> {
    if (target.shape === "nullable") {
      if (raw === undefined) return { success: true, value: target.emptyValue }
      return this.coerceLeaf(target.inner, raw, key, describeTarget(target))
    }

    return this.coerceLeaf(target, raw, key, describeTarget(target))
  }

  private coerceLeaf<T>(
    target: LeafTarget<T>,
    raw: string | undefined,
    key: string,
    targetName: string,
  ): CoercionResult<T> {
    const fail = (reason: CoercionFailureReason, cause?: unknown): CoercionResult<T> => ({
      success: false,
      error: new CoercionError(key, targetName, reason, cause),
    })

    if (target.shape === "scalar") {
      if (!this.registry.has(target.type)) return fail("unregistered_type")
      if (raw === undefined) {
        if (target.type === ValueTypes.string) {
          return { success: true, value: target.type.defaultValue }
        }
        return fail("missing_value")
      }

      try {
        return { success: true, value: target.type.parse(raw) }
      } catch (error) {
        return fail(error instanceof RangeError ? "out_of_range" : "invalid_format", error)
      }
    }

    if (raw === undefined) return fail("missing_value")

    try {
      return { success: true, value: parseEnum(raw, target) }
    } catch (error) {
      return fail("invalid_format", error)
    }
  }

  private coerceOrDefault<T>(target: ElementTarget<T>, raw: string | undefined, key: string): T {
    const result = this.coerce(target, raw, key)
    if (result.success) return result.value

    if (this.policy === "throw") throw result.error

    this.logger.warn("Configuration value could not be converted; using the default value", {
      configKey: key,
      targetType: describeTarget(target),
      err: result.error,
    })

    return defaultValueOf(target)
  }
}

/**
 * The value used when coercion fails under the "default" policy.
 */
export function defaultValueOf<T>(target: ElementTarget<T>): T {
  switch (target.shape) {
    case "scalar":
      return target.type.defaultValue
    case "enum":
      return target.defaultValue
    case "nullable":
      return target.emptyValue
    default:
      return assertNever(target)
  }
}
