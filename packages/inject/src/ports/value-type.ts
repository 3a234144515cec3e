/**
 * Duration in milliseconds. May be fractional: duration literals carry up to
 * seven fractional-second digits.
 */
export type Milliseconds = number

/**
 * A scalar type that raw configuration strings can be converted to.
 *
 * Value types are compared by identity: a resolver only accepts the value
 * types held by its registry.
 *
 * @example
 * ```typescript
 * const Port = defineValueType({
 *   name: "port",
 *   defaultValue: 0,
 *   parse: (raw) => {
 *     const n = Number(raw)
 *     if (!Number.isInteger(n) || n < 1 || n > 65535) throw new RangeError(`Invalid port: ${raw}`)
 *     return n
 *   },
 * })
 * ```
 */
export interface ValueType<T> {
  /** Name used in diagnostics, e.g. "int32" */
  readonly name: string

  /** Returned when a value is missing or cannot be parsed and the policy is "default" */
  readonly defaultValue: T

  /**
   * Parses one raw configuration value.
   *
   * Throws when the value is not valid; a RangeError marks a well-formed value
   * that does not fit the type.
   */
  parse(raw: string): T
}
