import { InvalidTargetTypeError } from "../errors"
import { createValueTypeRegistry } from "../value-type-registry"
import { builtInValueTypes, defineValueType, ValueTypes } from "../value-types"

describe("ValueTypes", () => {
  it("parses the canonical form of every built-in type", () => {
    expect(ValueTypes.string.parse("hello")).toBe("hello")
    expect(ValueTypes.boolean.parse("true")).toBe(true)
    expect(ValueTypes.char.parse("x")).toBe("x")
    expect(ValueTypes.int8.parse("-128")).toBe(-128)
    expect(ValueTypes.int16.parse("32767")).toBe(32_767)
    expect(ValueTypes.int32.parse("5")).toBe(5)
    expect(ValueTypes.uint8.parse("255")).toBe(255)
    expect(ValueTypes.uint16.parse("65535")).toBe(65_535)
    expect(ValueTypes.uint32.parse("4294967295")).toBe(4_294_967_295)
    expect(ValueTypes.int64.parse("-42")).toBe(-42n)
    expect(ValueTypes.float32.parse("0.5")).toBe(0.5)
    expect(ValueTypes.float64.parse("3.25")).toBe(3.25)
    expect(ValueTypes.duration.parse("00:00:30")).toBe(30_000)
    expect(ValueTypes.uuid.parse("00000000-0000-0000-0000-000000000001")).toBe(
      "00000000-0000-0000-0000-000000000001",
    )
    expect(ValueTypes.uri.parse("https://example.com/a")?.href).toBe("https://example.com/a")
  })

  it("enforces the width of each integer type", () => {
    expect(() => ValueTypes.int8.parse("128")).toThrow(RangeError)
    expect(() => ValueTypes.uint8.parse("-1")).toThrow(RangeError)
    expect(() => ValueTypes.uint32.parse("4294967296")).toThrow(RangeError)
  })

  it("rejects relative URIs", () => {
    expect(() => ValueTypes.uri.parse("/relative/path")).toThrow(TypeError)
  })

  it("uses zero-like defaults", () => {
    expect(ValueTypes.string.defaultValue).toBeNull()
    expect(ValueTypes.int32.defaultValue).toBe(0)
    expect(ValueTypes.int64.defaultValue).toBe(0n)
    expect(ValueTypes.char.defaultValue).toBe("\0")
    expect(ValueTypes.uuid.defaultValue).toBe("00000000-0000-0000-0000-000000000000")
    expect(ValueTypes.uri.defaultValue).toBeNull()
  })
})

describe("defineValueType", () => {
  it("returns a frozen copy", () => {
    const port = defineValueType({ name: "port", defaultValue: 0, parse: Number })

    expect(Object.isFrozen(port)).toBe(true)
    expect(port.parse("8080")).toBe(8080)
  })
})

describe("createValueTypeRegistry", () => {
  it("holds every built-in type", () => {
    const registry = createValueTypeRegistry()

    for (const type of builtInValueTypes) {
      expect(registry.has(type)).toBe(true)
    }
  })

  it("compares types by identity", () => {
    const lookalike = defineValueType({ name: "int32-copy", defaultValue: 0, parse: Number })
    const registry = createValueTypeRegistry()

    expect(registry.has(lookalike)).toBe(false)
    expect(createValueTypeRegistry([lookalike]).has(lookalike)).toBe(true)
  })

  it("rejects two types with the same name", () => {
    const duplicate = defineValueType({ name: "int32", defaultValue: 0, parse: Number })

    expect(() => createValueTypeRegistry([duplicate])).toThrow(InvalidTargetTypeError)
  })
})
