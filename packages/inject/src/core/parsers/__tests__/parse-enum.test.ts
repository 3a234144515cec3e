import { t } from "../../targets"
import { parseEnum } from "../parse-enum"

enum Mode {
  Fast,
  Safe,
}

const Level = { Low: "low", High: "high" } as const

describe("parseEnum", () => {
  it("matches member names case-sensitively by default", () => {
    const target = t.enumOf("Mode", Mode)

    expect(parseEnum("Safe", target)).toBe(Mode.Safe)
    expect(parseEnum(" Fast ", target)).toBe(Mode.Fast)
    expect(() => parseEnum("safe", target)).toThrow(SyntaxError)
  })

  it("matches names in any case when ignoreCase is set", () => {
    const target = t.enumOf("Mode", Mode, { ignoreCase: true })

    expect(parseEnum("SAFE", target)).toBe(Mode.Safe)
  })

  it("accepts the numeric value of a numeric member", () => {
    const target = t.enumOf("Mode", Mode)

    expect(parseEnum("1", target)).toBe(Mode.Safe)
    expect(() => parseEnum("2", target)).toThrow(SyntaxError)
  })

  it("accepts the string value of a string member", () => {
    const target = t.enumOf("Level", Level)

    expect(parseEnum("High", target)).toBe("high")
    expect(parseEnum("low", target)).toBe("low")
  })
})
