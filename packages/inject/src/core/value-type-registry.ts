import type { ValueType } from "../ports/value-type"
import { InvalidTargetTypeError } from "./errors"
import { builtInValueTypes } from "./value-types"

/**
 * The closed set of value types a resolver may convert to.
 */
export interface ValueTypeRegistry {
  has(type: ValueType<unknown>): boolean
}

class DefaultValueTypeRegistry implements ValueTypeRegistry {
  private readonly names = new Set<string>()
  private readonly types = new Set<ValueType<unknown>>()

  constructor(types: Iterable<ValueType<unknown>>) {
    for (const type of types) {
      if (this.names.has(type.name)) {
        throw new InvalidTargetTypeError(`Value type "${type.name}" is registered twice`, {
          valueType: type.name,
        })
      }

      this.names.add(type.name)
      this.types.add(type)
    }
  }

  has(type: ValueType<unknown>): boolean {
    return this.types.has(type)
  }
}

/**
 * Creates a registry holding the built-in value types plus `custom` ones.
 * The set cannot change afterwards.
 *
 * @throws InvalidTargetTypeError when two types share a name.
 */
export function createValueTypeRegistry(
  custom: readonly ValueType<unknown>[] = [],
): ValueTypeRegistry {
  return new DefaultValueTypeRegistry([...builtInValueTypes, ...custom])
}
