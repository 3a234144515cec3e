import { parseUuid } from "../parse-uuid"

const CANONICAL = "6f9619ff-8b86-d011-b42d-00c04fc964ff"

describe("parseUuid", () => {
  it.each([
    CANONICAL,
    "6F9619FF-8B86-D011-B42D-00C04FC964FF",
    "6f9619ff8b86d011b42d00c04fc964ff",
    "{6f9619ff-8b86-d011-b42d-00c04fc964ff}",
    "(6F9619FF8B86D011B42D00C04FC964FF)",
    `  ${CANONICAL}  `,
  ])("normalizes %j", (raw) => {
    expect(parseUuid(raw)).toBe(CANONICAL)
  })

  it.each([
    "",
    "not-a-uuid",
    "{6f9619ff-8b86-d011-b42d-00c04fc964ff",
    "{6f9619ff-8b86-d011-b42d-00c04fc964ff)",
    "6f9619ff-8b86-d011-b42d-00c04fc964f",
    "6f9619ff-8b86-d011-b42d-00c04fc964fg",
  ])("rejects %j", (raw) => {
    expect(() => parseUuid(raw)).toThrow(SyntaxError)
  })
})
