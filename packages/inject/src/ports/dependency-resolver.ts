import type { ServiceRegistry } from "./service-registry"

/**
 * Produces the value for one injected parameter or property.
 *
 * The host calls `resolve` once per injection site while constructing the
 * consuming object.
 */
export interface DependencyResolver<T> {
  resolve(services: ServiceRegistry): T
}
