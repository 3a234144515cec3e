import { combinePath } from "./path"

/**
 * Flattens loaded source values into `path -> string` entries.
 *
 * Nested objects and arrays become `:`-separated paths (array items keyed by
 * index), scalars are stringified and `null` becomes the empty string.
 * Empty objects, empty arrays and undefined values produce no entries.
 */
export function flattenValues(values: Record<string, unknown>): [string, string][] {
  const entries: [string, string][] = []

  const visit = (path: string, value: unknown): void => {
    if (value === undefined) return

    if (value === null) {
      entries.push([path, ""])
      return
    }

    if (Array.isArray(value)) {
      value.forEach((item, index) => visit(combinePath(path, String(index)), item))
      return
    }

    if (isPlainObject(value)) {
      for (const [key, child] of Object.entries(value)) {
        visit(combinePath(path, key), child)
      }
      return
    }

    entries.push([path, value instanceof Date ? value.toISOString() : String(value)])
  }

  for (const [key, value] of Object.entries(values)) {
    visit(key, value)
  }

  return entries
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false

  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
