import { NIL } from "uuid"
import type { Milliseconds, ValueType } from "../ports/value-type"
import { parseBoolean, parseChar } from "./parsers/parse-boolean"
import { parseDuration } from "./parsers/parse-duration"
import { parseFloat32, parseFloat64 } from "./parsers/parse-float"
import { parseInt64, parseInteger } from "./parsers/parse-integer"
import { parseUuid } from "./parsers/parse-uuid"

export function defineValueType<T>(definition: ValueType<T>): ValueType<T> {
  return Object.freeze({
    name: definition.name,
    defaultValue: definition.defaultValue,
    parse: (raw: string) => definition.parse(raw),
  })
}

const integer = (name: string, min: number, max: number): ValueType<number> =>
  defineValueType({ name, defaultValue: 0, parse: (raw) => parseInteger(raw, { min, max }) })

/**
 * Value types every registry starts with.
 *
 * `string` and `uri` default to null; a missing `string` value is not an error.
 */
export const ValueTypes = {
  string: defineValueType<string | null>({
    name: "string",
    defaultValue: null,
    parse: (raw) => raw,
  }),
  boolean: defineValueType({ name: "boolean", defaultValue: false, parse: parseBoolean }),
  char: defineValueType({ name: "char", defaultValue: "\0", parse: parseChar }),
  int8: integer("int8", -128, 127),
  int16: integer("int16", -32_768, 32_767),
  int32: integer("int32", -2_147_483_648, 2_147_483_647),
  uint8: integer("uint8", 0, 255),
  uint16: integer("uint16", 0, 65_535),
  uint32: integer("uint32", 0, 4_294_967_295),
  int64: defineValueType({ name: "int64", defaultValue: 0n, parse: parseInt64 }),
  float32: defineValueType({ name: "float32", defaultValue: 0, parse: parseFloat32 }),
  float64: defineValueType({ name: "float64", defaultValue: 0, parse: parseFloat64 }),
  duration: defineValueType<Milliseconds>({
    name: "duration",
    defaultValue: 0,
    parse: parseDuration,
  }),
  uuid: defineValueType({ name: "uuid", defaultValue: NIL, parse: parseUuid }),
  uri: defineValueType<URL | null>({
    name: "uri",
    defaultValue: null,
    parse: (raw) => new URL(raw),
  }),
} as const

export const builtInValueTypes: readonly ValueType<unknown>[] = Object.values(ValueTypes)
