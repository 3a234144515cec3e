import type { Milliseconds } from "../../ports/value-type"

// [-][d.]hh:mm[:ss[.fffffff]]
const CLOCK_PATTERN = /^(-)?(?:(\d+)\.)?(\d{1,2}):(\d{1,2})(?::(\d{1,2})(?:\.(\d{1,7}))?)?$/

// [-]d
const DAYS_PATTERN = /^(-)?(\d+)$/

const MS_PER_SECOND = 1_000
const MS_PER_MINUTE = 60 * MS_PER_SECOND
const MS_PER_HOUR = 60 * MS_PER_MINUTE
const MS_PER_DAY = 24 * MS_PER_HOUR

// 10675199 days is the largest whole number of days a 64-bit tick count holds
const MAX_DAYS = 10_675_199

/**
 * Parses a duration literal: `[-][d.]hh:mm[:ss[.fffffff]]`, or a bare whole
 * number of days. Surrounding whitespace is ignored.
 *
 * @example
 * parseDuration("00:00:30")     // 30_000
 * parseDuration("1.02:00:00")   // 93_600_000
 * parseDuration("7")            // 604_800_000
 *
 * @throws SyntaxError when the text does not match the grammar
 * @throws RangeError when hours exceed 23, minutes or seconds exceed 59, or days exceed the supported range
 */
export function parseDuration(raw: string): Milliseconds {
  const text = raw.trim()

  const days = DAYS_PATTERN.exec(text)
  if (days) {
    const [, sign, d = "0"] = days
    return applySign(sign, checkDays(Number(d)) * MS_PER_DAY)
  }

  const clock = CLOCK_PATTERN.exec(text)
  if (!clock) {
    throw new SyntaxError(`"${raw}" is not a duration`)
  }

  const [, sign, d = "0", h = "0", m = "0", s = "0", fraction = ""] = clock
  const hours = Number(h)
  const minutes = Number(m)
  const seconds = Number(s)

  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new RangeError(`"${raw}" has a component out of range`)
  }

  const fractionMs = fraction ? (Number(fraction) / 10 ** fraction.length) * MS_PER_SECOND : 0

  return applySign(
    sign,
    checkDays(Number(d)) * MS_PER_DAY +
      hours * MS_PER_HOUR +
      minutes * MS_PER_MINUTE +
      seconds * MS_PER_SECOND +
      fractionMs,
  )
}

function checkDays(days: number): number {
  if (days > MAX_DAYS) {
    throw new RangeError(`${days} days is out of range`)
  }
  return days
}

function applySign(sign: string | undefined, ms: number): Milliseconds {
  return sign === "-" && ms !== 0 ? -ms : ms
}
