import type { Logger } from "@confbind/logger"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfiguration } from "../ports/configuration"
import type { ConfigSource } from "../ports/source"
import { Configuration, type ConfigurationEntry } from "./configuration"
import { ConfigurationLoadError } from "./errors"
import { flattenValues, isPlainObject } from "./flatten"

export type BuildConfigurationOptions = {
  /** Applied in order, later sources override earlier ones. Defaults to the process environment. */
  sources?: ConfigSource[]
  logger?: Logger
}

export async function buildConfiguration({
  sources,
  logger,
}: BuildConfigurationOptions = {}): Promise<IConfiguration> {
  const log = logger?.child({ module: "configuration" })
  const entries: ConfigurationEntry[] = []

  for (const source of sources ?? [new EnvSource()]) {
    let values: unknown

    try {
      values = await source.load()
    } catch (err) {
      throw new ConfigurationLoadError(
        source.name,
        err instanceof Error ? err.message : String(err),
        err,
      )
    }

    if (!isPlainObject(values)) {
      throw new ConfigurationLoadError(source.name, "source did not produce an object")
    }

    const flattened = flattenValues(values)

    for (const [path, value] of flattened) {
      entries.push({ path, value, source: source.name })
    }

    log?.debug(`Loaded ${flattened.length} configuration values`, { source: source.name })
  }

  return new Configuration(entries)
}
