import type { ZodType } from "zod"
import type { ConfigurationProvider } from "./provider"

/**
 * A view of the configuration tree rooted at one path.
 *
 * Relative lookups (`get`, `getChildren`, `section`) are resolved beneath
 * the section's path.
 */
export interface IConfigurationSection extends ConfigurationProvider {
  /** Last path segment */
  readonly key: string

  /** Full path from the root */
  readonly path: string

  /** Value stored at the section's own path */
  readonly value: string | undefined

  section(key: string): IConfigurationSection

  /** `true` when the section has a value or at least one child */
  exists(): boolean
}

/**
 * Merged configuration snapshot.
 *
 * @example
 * ```typescript
 * const config = await buildConfiguration({
 *   sources: [new JsonSource({ file: "appsettings.json", required: true }), new EnvSource()],
 * })
 *
 * config.get("Retry:MaxAttempts")  // "5"
 * config.explain("Retry:MaxAttempts") // "env"
 * config.bind("Retry", z.object({ MaxAttempts: z.coerce.number() }))
 * ```
 */
export interface IConfiguration extends ConfigurationProvider {
  section(key: string): IConfigurationSection

  /**
   * Name of the source that supplied the value at `key`, or undefined when
   * no source did.
   */
  explain(key: string): string | undefined

  /** Names of all sources that contributed at least one value, in load order. */
  sourcesUsed(): string[]

  /** Every leaf path, in the order first loaded. */
  keys(): string[]

  /**
   * Rebuilds the section at `key` as a plain object (sections whose children
   * are keyed 0..n-1 become arrays) and validates it against `schema`.
   *
   * @throws ConfigurationValidationError when validation fails.
   */
  bind<T>(key: string, schema: ZodType<T>): T
}
