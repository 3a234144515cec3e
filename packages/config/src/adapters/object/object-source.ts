import type { ConfigSource } from "../../ports/source"

/**
 * In-memory values, typically overrides applied last or fixtures in tests.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Record<string, unknown>,
    name = "overrides",
  ) {
    this.name = `object:${name}`
  }

  async load(): Promise<Record<string, unknown>> {
    return structuredClone(this.values)
  }
}
