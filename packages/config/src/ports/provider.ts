/**
 * One immediate child of a configuration path.
 */
export type ConfigurationChild = Readonly<{
  /** Last path segment, e.g. "0" or "MaxAttempts" */
  key: string

  /** Full path, e.g. "Feature:Tags:0" */
  path: string

  /** Leaf value, undefined when the child only has children of its own */
  value: string | undefined
}>

/**
 * Read access to a hierarchical configuration tree.
 *
 * Paths use `:` as separator and are matched case-insensitively.
 */
export interface ConfigurationProvider {
  /** Raw value stored at exactly this path */
  get(key: string): string | undefined

  /**
   * Immediate children of a path, in the order the keys were first loaded.
   * The empty path lists the top-level keys.
   */
  getChildren(key: string): ConfigurationChild[]
}
