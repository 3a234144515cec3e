const HEX32 = /^[0-9a-f]{32}$/i
const HYPHENATED = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

/**
 * Parses a UUID in any of the usual textual forms and returns it in
 * lower-case hyphenated form:
 *
 * - `xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx`
 * - 32 hex digits without hyphens
 * - either of the above wrapped in `{}` or `()`
 *
 * Version and variant bits are not checked.
 */
export function parseUuid(raw: string): string {
  let text = raw.trim()

  if (
    (text.startsWith("{") && text.endsWith("}")) ||
    (text.startsWith("(") && text.endsWith(")"))
  ) {
    text = text.slice(1, -1)
  }

  if (HYPHENATED.test(text)) return text.toLowerCase()

  if (HEX32.test(text)) {
    const hex = text.toLowerCase()
    return [
      hex.slice(0, 8),
      hex.slice(8, 12),
      hex.slice(12, 16),
      hex.slice(16, 20),
      hex.slice(20),
    ].join("-")
  }

  throw new SyntaxError(`"${raw}" is not a UUID`)
}
