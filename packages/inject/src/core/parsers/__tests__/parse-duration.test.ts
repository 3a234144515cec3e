import { parseDuration } from "../parse-duration"

describe("parseDuration", () => {
  it.each([
    ["00:00:30", 30_000],
    ["1:2", 3_720_000],
    ["01:30", 5_400_000],
    ["1.02:00:00", 93_600_000],
    ["7", 604_800_000],
    ["00:00:00.5", 500],
    ["-00:01", -60_000],
    ["-2", -172_800_000],
    ["  00:00:01  ", 1_000],
  ])("parses %j as %d ms", (raw, expected) => {
    expect(parseDuration(raw)).toBe(expected)
  })

  it("keeps up to seven fractional-second digits", () => {
    expect(parseDuration("00:00:01.1234567")).toBeCloseTo(1_123.4567, 6)
  })

  it("returns positive zero for a negative zero duration", () => {
    expect(Object.is(parseDuration("-00:00"), 0)).toBe(true)
  })

  it.each(["", "abc", "1:", "00:00:00.12345678", "1.2.3:00", "00-00"])(
    "rejects %j as malformed",
    (raw) => {
      expect(() => parseDuration(raw)).toThrow(SyntaxError)
    },
  )

  it.each(["24:00:00", "00:60", "00:00:60", "10675200"])("rejects %j as out of range", (raw) => {
    expect(() => parseDuration(raw)).toThrow(RangeError)
  })
})
