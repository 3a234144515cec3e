export { ConfigurationBinding, injectConfiguration } from "./core/configuration-binding"
export {
  CircularDependencyError,
  CoercionError,
  InvalidTargetTypeError,
  ServiceAlreadyRegisteredError,
  ServiceNotRegisteredError,
} from "./core/errors"
export { arrayCollector } from "./core/materialize"
export { parseDuration } from "./core/parsers/parse-duration"
export { parseUuid } from "./core/parsers/parse-uuid"
export { ServiceContainer } from "./core/service-container"
export { createToken, ServiceToken } from "./core/service-token"
export { describeTarget, type EnumOptions, t } from "./core/targets"
export { ConfigurationToken, LoggerToken, ValueTypeRegistryToken } from "./core/tokens"
export { defaultValueOf, ValueResolver, type ValueResolverDeps } from "./core/value-resolver"
export { createValueTypeRegistry, type ValueTypeRegistry } from "./core/value-type-registry"
export { builtInValueTypes, defineValueType, ValueTypes } from "./core/value-types"
export type { CoercionFailureReason, CoercionResult } from "./ports/coercion-result"
export type { DependencyResolver } from "./ports/dependency-resolver"
export type { ServiceFactory, ServiceRegistry } from "./ports/service-registry"
export type {
  ArrayTarget,
  ElementTarget,
  EnumTarget,
  LeafTarget,
  ListCollector,
  ListTarget,
  NullableTarget,
  ReadOnlyListTarget,
  ScalarTarget,
  TargetType,
} from "./ports/target-type"
export type {
  CoercionErrorPolicy,
  IValueResolver,
  ValueResolverOptions,
} from "./ports/value-resolver"
export type { Milliseconds, ValueType } from "./ports/value-type"
