const INTEGER_PATTERN = /^[+-]?\d+$/

export type IntegerRange = Readonly<{ min: number; max: number }>

/**
 * Parses a base-10 integer with optional sign and surrounding whitespace.
 *
 * @throws SyntaxError when the text is not an integer
 * @throws RangeError when it falls outside `range`
 */
export function parseInteger(raw: string, range: IntegerRange): number {
  const text = raw.trim()

  if (!INTEGER_PATTERN.test(text)) {
    throw new SyntaxError(`"${raw}" is not an integer`)
  }

  const value = Number(text)

  if (value < range.min || value > range.max) {
    throw new RangeError(`${text} is outside [${range.min}, ${range.max}]`)
  }

  return value === 0 ? 0 : value
}

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

export function parseInt64(raw: string): bigint {
  const text = raw.trim()

  if (!INTEGER_PATTERN.test(text)) {
    throw new SyntaxError(`"${raw}" is not an integer`)
  }

  const value = BigInt(text)

  if (value < INT64_MIN || value > INT64_MAX) {
    throw new RangeError(`${text} is outside the 64-bit integer range`)
  }

  return value
}
