import path from "node:path"
import { fileURLToPath } from "node:url"
import {
  buildConfiguration,
  type ConfigSource,
  DotenvSource,
  EnvSource,
  type IConfiguration,
  JsonSource,
  ObjectSource,
} from "@confbind/config"
import type { ServiceContainer } from "@confbind/inject"
import { createPinoLogger, type Logger } from "@confbind/logger"
import { type LoggingConfig, loggingSchema } from "./config/logging"
import { createServices } from "./services"

export type AppContextOptions = {
  env?: Record<string, string | undefined>
  cwd?: string
  configOverrides?: Record<string, unknown>
  logger?: Logger
}

export type AppContext = {
  configuration: IConfiguration
  logging: LoggingConfig
  logger: Logger
  services: ServiceContainer
}

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..")

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const env = options.env ?? process.env
  const cwd = options.cwd ?? projectRoot

  const sources: ConfigSource[] = [
    new JsonSource({ file: "appsettings.json", required: false, cwd }),
    new DotenvSource({ file: `.env.${env.NODE_ENV ?? "development"}`, required: false, cwd }),
    new EnvSource({ env, prefix: "DISPATCHER_" }),
  ]
  if (options.configOverrides) sources.push(new ObjectSource(options.configOverrides))

  const configuration = await buildConfiguration({ sources, logger: options.logger })
  const logging = configuration.bind("Logging", loggingSchema)

  const logger =
    options.logger ??
    createPinoLogger({}, { level: logging.Level, prettify: logging.Pretty }).child({
      service: "webhook-dispatcher",
    })

  return {
    configuration,
    logging,
    logger,
    services: createServices(configuration, logger),
  }
}
