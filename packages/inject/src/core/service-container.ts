import type { ServiceFactory, ServiceRegistry } from "../ports/service-registry"
import {
  CircularDependencyError,
  ServiceAlreadyRegisteredError,
  ServiceNotRegisteredError,
} from "./errors"
import type { ServiceToken } from "./service-token"

/**
 * Minimal singleton container.
 *
 * Factories run lazily, at most once, on first lookup; the value they return
 * is kept for the lifetime of the container.
 *
 * @example
 * ```typescript
 * const container = new ServiceContainer()
 * container.registerValue(ConfigurationToken, configuration)
 * container.register(RetryPolicyToken, (services) =>
 *   new RetryPolicy(maxAttempts.resolve(services)),
 * )
 * const policy = container.getRequired(RetryPolicyToken)
 * ```
 */
export class ServiceContainer implements ServiceRegistry {
  private readonly tokens = new Set<ServiceToken<unknown>>()

  register<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): this {
    this.assertUnregistered(token)
    token.registrations.set(this, {
      kind: "factory",
      create: () => factory(this),
      state: "pending",
    })
    this.tokens.add(token)
    return this
  }

  registerValue<T>(token: ServiceToken<T>, value: T): this {
    this.assertUnregistered(token)
    token.registrations.set(this, { kind: "value", value })
    this.tokens.add(token)
    return this
  }

  getRequired<T>(token: ServiceToken<T>): T {
    const registration = token.registrations.get(this)
    if (!registration) throw new ServiceNotRegisteredError(token.name)

    if (registration.kind === "value") return registration.value

    if (registration.state === "creating") throw new CircularDependencyError(token.name)

    registration.state = "creating"
    try {
      const value = registration.create()
      token.registrations.set(this, { kind: "value", value })
      return value
    } finally {
      registration.state = "pending"
    }
  }

  get<T>(token: ServiceToken<T>): T | undefined {
    return this.has(token) ? this.getRequired(token) : undefined
  }

  has(token: ServiceToken<unknown>): boolean {
    return this.tokens.has(token)
  }

  private assertUnregistered(token: ServiceToken<unknown>): void {
    if (this.tokens.has(token)) throw new ServiceAlreadyRegisteredError(token.name)
  }
}
