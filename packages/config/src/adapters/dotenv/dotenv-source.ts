import { parse } from "dotenv"
import { fromEnvKey } from "../../core/path"
import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, readSourceFile } from "../file/read-source-file"

export type DotenvSourceOptions = FileSourceOptions & {
  /**
   * Key segment separator mapped to `:`.
   *
   * @default "__"
   */
  separator?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readSourceFile(this.opts)
    if (content === undefined) return {}

    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(parse(content))) {
      values[fromEnvKey(key, this.opts.separator)] = value
    }

    return values
  }
}
