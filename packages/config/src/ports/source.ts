/**
 * A source of configuration values.
 *
 * A ConfigSource is responsible only for *loading* raw configuration.
 * It does not perform validation, coercion, or merging.
 *
 * Sources are merged in order; later sources override earlier ones key path
 * by key path, so command-line flags are conventionally listed last.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "dotenv:.env.defaults", "json:config.json", "argv"
   */
  readonly name: string

  /**
   * Load configuration values.
   *
   * - Env/dotenv sources return string values (nested when a separator is set)
   * - JSON sources and the argv source may return nested objects
   * - A key that is absent or undefined means "value not provided"
   * - Zod handles coercion and validation downstream
   *
   * The returned object belongs to the caller.
   */
  load(): Promise<Record<string, unknown>>
}
