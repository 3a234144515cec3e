import type { ConfigurationChild } from "@confbind/config"
import type { ValueType } from "./value-type"

export type ScalarTarget<T> = Readonly<{
  shape: "scalar"
  type: ValueType<T>
}>

export type EnumTarget<T> = Readonly<{
  shape: "enum"
  name: string
  /** Member names paired with their values, in declaration order */
  members: ReadonlyArray<readonly [string, T]>
  ignoreCase: boolean
  defaultValue: T
}>

export type LeafTarget<T> = ScalarTarget<T> | EnumTarget<T>

/**
 * Resolves to `emptyValue` (null) when the raw value is absent, otherwise to
 * the inner target's value.
 */
export type NullableTarget<T> = Readonly<{
  shape: "nullable"
  inner: LeafTarget<T>
  emptyValue: T
}>

export type ElementTarget<T> = LeafTarget<T> | NullableTarget<T>

/**
 * Converts one child entry with the given element target.
 */
export type ElementCoercer = <E>(element: ElementTarget<E>, child: ConfigurationChild) => E

type CollectionTarget<S extends string, T> = Readonly<{
  shape: S
  element: ElementTarget<unknown>
  /**
   * Builds the collection from the children found under the binding key,
   * converting each one with `coerce`, in the order given.
   */
  materialize(children: readonly ConfigurationChild[], coerce: ElementCoercer): T
}>

/** Plain array with exactly one slot per child */
export type ArrayTarget<T> = CollectionTarget<"array", T>

/** Container created empty, then appended to once per child */
export type ListTarget<T> = CollectionTarget<"list", T>

/** Frozen array */
export type ReadOnlyListTarget<T> = CollectionTarget<"readOnlyList", T>

/**
 * Static description of the value a binding produces.
 *
 * The shapes are mutually exclusive; build them with `t`.
 */
export type TargetType<T> =
  | ScalarTarget<T>
  | EnumTarget<T>
  | NullableTarget<T>
  | ArrayTarget<T>
  | ListTarget<T>
  | ReadOnlyListTarget<T>

/**
 * Creates the empty container for a list target and appends to it.
 */
export type ListCollector<E, C> = Readonly<{
  create(): C
  append(container: C, item: E): void
}>
