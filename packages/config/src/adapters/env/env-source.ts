import { fromEnvKey } from "../../core/path"
import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with the prefix are loaded; the prefix is stripped. */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>

  /**
   * Key segment separator mapped to `:`, so `Retry__Timeout` loads as `Retry:Timeout`.
   *
   * @default "__"
   */
  separator?: string
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>
  private readonly separator: string | undefined

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.separator = options.separator
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (!key.startsWith(this.prefix) || key.length === this.prefix.length) continue

      values[fromEnvKey(key.slice(this.prefix.length), this.separator)] = value
    }

    return values
  }
}
