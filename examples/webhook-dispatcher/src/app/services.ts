import type { ConfigurationProvider, IConfiguration } from "@confbind/config"
import {
  ConfigurationToken,
  createToken,
  LoggerToken,
  type Milliseconds,
  ServiceContainer,
} from "@confbind/inject"
import type { Logger } from "@confbind/logger"
import { type DeliveryMode, webhookBindings } from "./config/bindings"

export type DispatcherSettings = {
  mode: DeliveryMode
  endpoints: readonly URL[]
  signingKeyId: string | null
  maxAttempts: number
  timeoutMs: Milliseconds
  retryOn: number[]
  headers: Record<string, string>
}

export const DispatcherSettingsToken = createToken<DispatcherSettings>("dispatcher-settings")

export function createServices(configuration: IConfiguration, logger: Logger): ServiceContainer {
  return new ServiceContainer()
    .registerValue(ConfigurationToken, configuration)
    .registerValue(LoggerToken, logger)
    .register(DispatcherSettingsToken, (services) => ({
      mode: webhookBindings.mode.resolve(services),
      // null entries are URLs that failed to parse
      endpoints: webhookBindings.endpoints.resolve(services).filter((url) => url !== null),
      signingKeyId: webhookBindings.signingKeyId.resolve(services),
      maxAttempts: webhookBindings.maxAttempts.resolve(services),
      timeoutMs: webhookBindings.timeout.resolve(services),
      retryOn: webhookBindings.retryOn.resolve(services),
      headers: readHeaders(services.getRequired(ConfigurationToken)),
    }))
}

function readHeaders(configuration: ConfigurationProvider): Record<string, string> {
  const headers: Record<string, string> = {}

  for (const child of configuration.getChildren("Webhooks:Headers")) {
    if (child.value !== undefined) headers[child.key] = child.value
  }

  return headers
}
