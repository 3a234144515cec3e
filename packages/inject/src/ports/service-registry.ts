import type { ServiceToken } from "../core/service-token"

/**
 * Read side of the service container, handed to factories and bindings.
 */
export interface ServiceRegistry {
  /**
   * @throws ServiceNotRegisteredError when nothing is registered for the token.
   */
  getRequired<T>(token: ServiceToken<T>): T

  get<T>(token: ServiceToken<T>): T | undefined

  has(token: ServiceToken<unknown>): boolean
}

export type ServiceFactory<T> = (services: ServiceRegistry) => T
