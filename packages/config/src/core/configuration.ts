import type { ZodType } from "zod"
import { z } from "zod"
import type { IConfiguration, IConfigurationSection } from "../ports/configuration"
import type { ConfigurationChild } from "../ports/provider"
import { ConfigurationSection } from "./configuration-section"
import { ConfigurationValidationError } from "./errors"
import { combinePath, normalizeKey, splitPath } from "./path"

export type ConfigurationEntry = Readonly<{
  path: string
  value: string
  source: string
}>

export class Configuration implements IConfiguration {
  private readonly entries: ReadonlyMap<string, ConfigurationEntry>

  /**
   * @param entries - Leaf entries in load order. A later entry for the same
   *   path (compared case-insensitively) replaces the value but keeps the
   *   position and casing of the first one.
   */
  constructor(entries: Iterable<ConfigurationEntry>) {
    const merged = new Map<string, ConfigurationEntry>()

    for (const entry of entries) {
      const id = normalizeKey(entry.path)
      const existing = merged.get(id)

      merged.set(id, existing ? { ...entry, path: existing.path } : entry)
    }

    this.entries = merged
  }

  get(key: string): string | undefined {
    return this.entries.get(normalizeKey(key))?.value
  }

  getChildren(key: string): ConfigurationChild[] {
    const parent = key.length > 0 ? splitPath(key).map(normalizeKey) : []
    const children = new Map<string, string>()

    for (const entry of this.entries.values()) {
      const segments = splitPath(entry.path)
      const segment = segments[parent.length]

      if (segment === undefined) continue
      if (!parent.every((p, i) => normalizeKey(segments[i] ?? "") === p)) continue

      const segmentId = normalizeKey(segment)
      if (!children.has(segmentId)) children.set(segmentId, segment)
    }

    return [...children.values()].map((segment) => {
      const path = combinePath(key, segment)
      return { key: segment, path, value: this.get(path) }
    })
  }

  section(key: string): IConfigurationSection {
    return new ConfigurationSection(this, key)
  }

  explain(key: string): string | undefined {
    return this.entries.get(normalizeKey(key))?.source
  }

  sourcesUsed(): string[] {
    const sources = [...this.entries.values()].map((e) => e.source)

    return [...new Set(sources)]
  }

  keys(): string[] {
    return [...this.entries.values()].map((e) => e.path)
  }

  bind<T>(key: string, schema: ZodType<T>): T {
    const section = this.section(key)
    const result = schema.safeParse(section.exists() ? toPlainValue(section) : undefined)

    if (!result.success) {
      throw new ConfigurationValidationError(key, z.prettifyError(result.error), result.error)
    }

    return result.data
  }
}

function toPlainValue(section: IConfigurationSection): unknown {
  const children = section.getChildren("")

  if (children.length === 0) return section.value

  if (isIndexSequence(children)) {
    return children.map((child) => toPlainValue(section.section(child.key)))
  }

  const out: Record<string, unknown> = {}
  for (const child of children) {
    out[child.key] = toPlainValue(section.section(child.key))
  }
  return out
}

function isIndexSequence(children: ConfigurationChild[]): boolean {
  return children.every((child, i) => child.key === String(i))
}
