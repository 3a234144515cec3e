import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, readSourceFile } from "../file/read-source-file"

export type JsonSourceOptions = FileSourceOptions

/**
 * Loads a JSON document. Nested objects and arrays are kept as-is and
 * flattened into paths when the configuration is built.
 */
export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readSourceFile(this.opts)

    return content === undefined ? {} : JSON.parse(content)
  }
}
