const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i

const SPECIAL_VALUES: Record<string, number> = {
  nan: Number.NaN,
  infinity: Number.POSITIVE_INFINITY,
  "+infinity": Number.POSITIVE_INFINITY,
  "-infinity": Number.NEGATIVE_INFINITY,
}

/**
 * Parses a decimal or exponent-notation number, or NaN / Infinity by name
 * (case-insensitive). Values beyond the double range become Infinity.
 *
 * @throws SyntaxError when the text is not a number
 */
export function parseFloat64(raw: string): number {
  const text = raw.trim()
  const special = SPECIAL_VALUES[text.toLowerCase()]

  if (special !== undefined) return special

  if (!FLOAT_PATTERN.test(text)) {
    throw new SyntaxError(`"${raw}" is not a number`)
  }

  return Number(text)
}

export function parseFloat32(raw: string): number {
  return Math.fround(parseFloat64(raw))
}
