export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export type { FileSourceOptions } from "./adapters/file/read-source-file"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export { type BuildConfigurationOptions, buildConfiguration } from "./core/build"
export { Configuration, type ConfigurationEntry } from "./core/configuration"
export { ConfigurationSection } from "./core/configuration-section"
export { ConfigurationLoadError, ConfigurationValidationError } from "./core/errors"
export { flattenValues } from "./core/flatten"
export { combinePath, fromEnvKey, KEY_DELIMITER } from "./core/path"
export type { IConfiguration, IConfigurationSection } from "./ports/configuration"
export type { ConfigurationChild, ConfigurationProvider } from "./ports/provider"
export type { ConfigSource } from "./ports/source"
