import type { EnumTarget } from "../../ports/target-type"

const NUMERIC_PATTERN = /^[+-]?\d+$/

/**
 * Matches a raw value against an enum's member names, then against its
 * member values.
 *
 * Name matching is case-sensitive unless the target sets `ignoreCase`.
 *
 * @throws SyntaxError when nothing matches
 */
export function parseEnum<T>(raw: string, target: EnumTarget<T>): T {
  const text = raw.trim()
  const wanted = target.ignoreCase ? text.toLowerCase() : text

  for (const [name, value] of target.members) {
    if ((target.ignoreCase ? name.toLowerCase() : name) === wanted) return value
  }

  for (const [, value] of target.members) {
    if (typeof value === "string" && value === text) return value
    if (typeof value === "number" && NUMERIC_PATTERN.test(text) && value === Number(text)) {
      return value
    }
  }

  throw new SyntaxError(`"${raw}" is not a member of ${target.name}`)
}
