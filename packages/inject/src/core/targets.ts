import type {
  ArrayTarget,
  ElementTarget,
  EnumTarget,
  LeafTarget,
  ListCollector,
  ListTarget,
  NullableTarget,
  ReadOnlyListTarget,
  ScalarTarget,
  TargetType,
} from "../ports/target-type"
import type { ValueType } from "../ports/value-type"
import { assertNever } from "./assert-never"
import { InvalidTargetTypeError } from "./errors"
import {
  arrayCollector,
  materializeArray,
  materializeList,
  materializeReadOnlyList,
} from "./materialize"
import { ValueTypes } from "./value-types"

function scalar<T>(type: ValueType<T>): ScalarTarget<T> {
  return { shape: "scalar", type }
}

export type EnumOptions<T> = {
  /** @default false */
  ignoreCase?: boolean

  /** @default the first member */
  defaultValue?: T
}

function hasKey<O extends object>(obj: O, key: PropertyKey): key is keyof O {
  return key in obj
}

/**
 * Describes a TypeScript enum, or a const object used as one.
 *
 * Numeric enums' reverse mappings are skipped.
 *
 * @example
 * ```typescript
 * enum Mode { Fast, Safe }
 * t.enumOf("Mode", Mode)                           // EnumTarget<Mode>
 * t.enumOf("Level", { Low: "low", High: "high" } as const)  // EnumTarget<"low" | "high">
 * ```
 */
function enumOf<E extends object>(
  name: string,
  values: E,
  options: EnumOptions<E[keyof E]> = {},
): EnumTarget<E[keyof E]> {
  const members: (readonly [string, E[keyof E]])[] = []

  for (const key of Object.keys(values)) {
    if (!hasKey(values, key) || isReverseMapping(key)) continue

    const value = values[key]
    if (typeof value === "string" || typeof value === "number") {
      members.push([key, value])
    }
  }

  const first = members[0]
  if (!first) {
    throw new InvalidTargetTypeError(`Enum "${name}" has no members`, { enum: name })
  }

  return {
    shape: "enum",
    name,
    members,
    ignoreCase: options.ignoreCase ?? false,
    defaultValue: options.defaultValue ?? first[1],
  }
}

function isReverseMapping(key: string): boolean {
  return key.trim() !== "" && !Number.isNaN(Number(key))
}

function nullable<T>(inner: LeafTarget<T>): NullableTarget<T | null> {
  return { shape: "nullable", inner, emptyValue: null }
}

function array<E>(element: ElementTarget<E>): ArrayTarget<E[]> {
  return {
    shape: "array",
    element,
    materialize: (children, coerce) =>
      materializeArray(children, (child) => coerce(element, child)),
  }
}

function list<E>(element: ElementTarget<E>): ListTarget<E[]>
function list<E, C>(element: ElementTarget<E>, collector: ListCollector<E, C>): ListTarget<C>
function list<E, C>(
  element: ElementTarget<E>,
  collector?: ListCollector<E, C>,
): ListTarget<C> | ListTarget<E[]> {
  if (collector) {
    return {
      shape: "list",
      element,
      materialize: (children, coerce) =>
        materializeList(children, (child) => coerce(element, child), collector),
    }
  }

  const defaultCollector = arrayCollector<E>()
  return {
    shape: "list",
    element,
    materialize: (children, coerce) =>
      materializeList(children, (child) => coerce(element, child), defaultCollector),
  }
}

function readOnlyList<E>(element: ElementTarget<E>): ReadOnlyListTarget<readonly E[]> {
  return {
    shape: "readOnlyList",
    element,
    materialize: (children, coerce) =>
      materializeReadOnlyList(children, (child) => coerce(element, child)),
  }
}

/**
 * Target type builders.
 *
 * @example
 * ```typescript
 * t.int32                          // number
 * t.nullable(t.duration)           // number | null
 * t.array(t.string)                // (string | null)[]
 * t.list(t.int32, setCollector())  // Set<number>
 * t.readOnlyList(t.uuid)           // readonly string[]
 * ```
 */
export const t = {
  string: scalar(ValueTypes.string),
  boolean: scalar(ValueTypes.boolean),
  char: scalar(ValueTypes.char),
  int8: scalar(ValueTypes.int8),
  int16: scalar(ValueTypes.int16),
  int32: scalar(ValueTypes.int32),
  uint8: scalar(ValueTypes.uint8),
  uint16: scalar(ValueTypes.uint16),
  uint32: scalar(ValueTypes.uint32),
  int64: scalar(ValueTypes.int64),
  float32: scalar(ValueTypes.float32),
  float64: scalar(ValueTypes.float64),
  duration: scalar(ValueTypes.duration),
  uuid: scalar(ValueTypes.uuid),
  uri: scalar(ValueTypes.uri),
  scalar,
  enumOf,
  nullable,
  array,
  list,
  readOnlyList,
} as const

/**
 * Readable name of a target, e.g. `int32[]`, `ReadOnlyList<uuid>`,
 * `Nullable<duration>`, `enum Mode`.
 */
export function describeTarget(target: TargetType<unknown>): string {
  switch (target.shape) {
    case "scalar":
      return target.type.name
    case "enum":
      return `enum ${target.name}`
    case "nullable":
      return `Nullable<${describeTarget(target.inner)}>`
    case "array":
      return `${describeTarget(target.element)}[]`
    case "list":
      return `List<${describeTarget(target.element)}>`
    case "readOnlyList":
      return `ReadOnlyList<${describeTarget(target.element)}>`
    default:
      return assertNever(target)
  }
}
