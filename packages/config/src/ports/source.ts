/**
 * A source of configuration values.
 *
 * A ConfigSource is responsible only for *loading* raw configuration.
 * It does not validate, coerce or merge.
 *
 * Sources are applied in order; later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "dotenv:.env.defaults", "json:appsettings.json"
   */
  readonly name: string

  /**
   * Load configuration values.
   *
   * - Keys may already be hierarchical paths ("Retry:Timeout")
   * - Values may be nested objects and arrays; they are flattened into
   *   `:`-separated paths, array items keyed by index
   * - Returning undefined for a key means "value not provided"
   */
  load(): Promise<Record<string, unknown>>
}
