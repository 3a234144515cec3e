import { parseFloat32, parseFloat64 } from "../parse-float"

describe("parseFloat64", () => {
  it.each([
    ["1.5", 1.5],
    [" -0.25 ", -0.25],
    ["1e3", 1_000],
    [".5", 0.5],
    ["5.", 5],
    ["Infinity", Number.POSITIVE_INFINITY],
    ["-infinity", Number.NEGATIVE_INFINITY],
  ])("parses %j", (raw, expected) => {
    expect(parseFloat64(raw)).toBe(expected)
  })

  it("parses NaN by name", () => {
    expect(parseFloat64("NaN")).toBeNaN()
  })

  it.each(["", "abc", "1,5", "0x1p3", "--1"])("rejects %j", (raw) => {
    expect(() => parseFloat64(raw)).toThrow(SyntaxError)
  })
})

describe("parseFloat32", () => {
  it("rounds to single precision", () => {
    expect(parseFloat32("0.1")).toBe(Math.fround(0.1))
    expect(parseFloat32("0.1")).not.toBe(0.1)
  })
})
