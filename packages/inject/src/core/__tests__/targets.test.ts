import { InvalidTargetTypeError } from "../errors"
import { describeTarget, t } from "../targets"

enum Mode {
  Fast,
  Safe,
}

describe("t", () => {
  it("builds enum targets without reverse mappings", () => {
    const target = t.enumOf("Mode", Mode)

    expect(target.members).toEqual([
      ["Fast", Mode.Fast],
      ["Safe", Mode.Safe],
    ])
    expect(target.ignoreCase).toBe(false)
    expect(target.defaultValue).toBe(Mode.Fast)
  })

  it("takes an explicit enum default", () => {
    expect(t.enumOf("Mode", Mode, { defaultValue: Mode.Safe }).defaultValue).toBe(Mode.Safe)
  })

  it("rejects enums without members", () => {
    expect(() => t.enumOf("Empty", {})).toThrow(InvalidTargetTypeError)
  })

  it("gives nullable targets a null empty value", () => {
    const target = t.nullable(t.int32)

    expect(target.shape).toBe("nullable")
    expect(target.emptyValue).toBeNull()
    expect(target.inner).toBe(t.int32)
  })

  it("keeps the element target of collections", () => {
    expect(t.array(t.int32).element).toBe(t.int32)
    expect(t.list(t.string).shape).toBe("list")
    expect(t.readOnlyList(t.uuid).shape).toBe("readOnlyList")
  })
})

describe("describeTarget", () => {
  it.each([
    [t.int32, "int32"],
    [t.array(t.int32), "int32[]"],
    [t.list(t.string), "List<string>"],
    [t.readOnlyList(t.uuid), "ReadOnlyList<uuid>"],
    [t.nullable(t.duration), "Nullable<duration>"],
    [t.array(t.nullable(t.boolean)), "Nullable<boolean>[]"],
    [t.enumOf("Mode", Mode), "enum Mode"],
  ])("describes %#", (target, expected) => {
    expect(describeTarget(target)).toBe(expected)
  })
})
