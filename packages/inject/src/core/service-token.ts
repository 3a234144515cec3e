/**
 * Typed key for a service in a ServiceContainer.
 *
 * Tokens are compared by identity; the name is only used in messages.
 */
export class ServiceToken<T> {
  /** @internal Registrations of this token, per container */
  readonly registrations = new WeakMap<object, Registration<T>>()

  constructor(readonly name: string) {}

  toString(): string {
    return `ServiceToken(${this.name})`
  }
}

export type Registration<T> =
  | { kind: "value"; value: T }
  | { kind: "factory"; create: () => T; state: "pending" | "creating" }

export function createToken<T>(name: string): ServiceToken<T> {
  return new ServiceToken<T>(name)
}
