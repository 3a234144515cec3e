/**
 * Accepts "true" or "false" in any letter case, ignoring surrounding whitespace.
 */
export function parseBoolean(raw: string): boolean {
  const text = raw.trim().toLowerCase()

  if (text === "true") return true
  if (text === "false") return false

  throw new SyntaxError(`"${raw}" is not a boolean`)
}

/**
 * A single UTF-16 code unit or a single astral code point.
 */
export function parseChar(raw: string): string {
  if ([...raw].length !== 1) {
    throw new SyntaxError(`"${raw}" is not a single character`)
  }

  return raw
}
