import type { DependencyResolver } from "../ports/dependency-resolver"
import type { ServiceRegistry } from "../ports/service-registry"
import type { TargetType } from "../ports/target-type"
import type { ValueResolverOptions } from "../ports/value-resolver"
import { InvalidTargetTypeError } from "./errors"
import { describeTarget } from "./targets"
import { ConfigurationToken, LoggerToken, ValueTypeRegistryToken } from "./tokens"
import { ValueResolver } from "./value-resolver"

/**
 * Injects the configuration value stored under a fixed key.
 *
 * The configuration provider, and optionally a logger and a value type
 * registry, are fetched from the registry on every call.
 */
export class ConfigurationBinding<T> implements DependencyResolver<T> {
  constructor(
    readonly key: string,
    readonly target: TargetType<T>,
    private readonly opts: ValueResolverOptions = {},
  ) {
    if (key.trim() === "") {
      throw new InvalidTargetTypeError("Configuration binding key must not be empty", {
        targetType: describeTarget(target),
      })
    }
  }

  /**
   * @throws ServiceNotRegisteredError when no configuration is registered.
   * @throws CoercionError when the value cannot be converted and the policy is "throw".
   */
  resolve(services: ServiceRegistry): T {
    const provider = services.getRequired(ConfigurationToken)
    const resolver = new ValueResolver(
      {
        registry: services.get(ValueTypeRegistryToken),
        logger: services.get(LoggerToken),
      },
      this.opts,
    )

    return resolver.resolve(this.key, this.target, provider)
  }

  toString(): string {
    return `${this.key}: ${describeTarget(this.target)}`
  }
}

/**
 * @example
 * ```typescript
 * const timeout = injectConfiguration("Retry:Timeout", t.duration)
 * container.register(RetryPolicyToken, (services) =>
 *   new RetryPolicy({ timeoutMs: timeout.resolve(services) }),
 * )
 * ```
 */
export function injectConfiguration<T>(
  key: string,
  target: TargetType<T>,
  opts: ValueResolverOptions = {},
): ConfigurationBinding<T> {
  return new ConfigurationBinding(key, target, opts)
}
