export const KEY_DELIMITER = ":"

export function combinePath(...segments: string[]): string {
  return segments.filter((s) => s.length > 0).join(KEY_DELIMITER)
}

export function splitPath(path: string): string[] {
  return path.split(KEY_DELIMITER)
}

export function lastSegment(path: string): string {
  const i = path.lastIndexOf(KEY_DELIMITER)
  return i === -1 ? path : path.slice(i + 1)
}

export function normalizeKey(key: string): string {
  return key.toLowerCase()
}

/**
 * Maps an environment-style key to a configuration path:
 * `Retry__MaxAttempts` -> `Retry:MaxAttempts`.
 */
export function fromEnvKey(key: string, separator = "__"): string {
  return key.split(separator).join(KEY_DELIMITER)
}
