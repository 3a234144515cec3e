import type { ConfigurationProvider } from "@confbind/config"
import type { Logger } from "@confbind/logger"
import { createToken } from "./service-token"
import type { ValueTypeRegistry } from "./value-type-registry"

export const ConfigurationToken = createToken<ConfigurationProvider>("configuration")

export const LoggerToken = createToken<Logger>("logger")

/** Optional; bindings fall back to the built-in value types */
export const ValueTypeRegistryToken = createToken<ValueTypeRegistry>("value-type-registry")
