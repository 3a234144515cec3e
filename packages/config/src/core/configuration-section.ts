import type { IConfigurationSection } from "../ports/configuration"
import type { ConfigurationChild, ConfigurationProvider } from "../ports/provider"
import { combinePath, lastSegment } from "./path"

export class ConfigurationSection implements IConfigurationSection {
  readonly key: string

  constructor(
    private readonly root: ConfigurationProvider,
    readonly path: string,
  ) {
    this.key = lastSegment(path)
  }

  get value(): string | undefined {
    return this.root.get(this.path)
  }

  get(key: string): string | undefined {
    return this.root.get(combinePath(this.path, key))
  }

  getChildren(key: string): ConfigurationChild[] {
    return this.root.getChildren(combinePath(this.path, key))
  }

  section(key: string): IConfigurationSection {
    return new ConfigurationSection(this.root, combinePath(this.path, key))
  }

  exists(): boolean {
    return this.value !== undefined || this.getChildren("").length > 0
  }
}
