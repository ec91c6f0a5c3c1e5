/**
 * Configuration container providing type-safe access to validated configuration values.
 *
 * @typeParam T - The shape of the configuration object, typically inferred from a Zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     format: z.enum(["json", "text"]).default("text"),
 *     verbosity: z.coerce.number().default(0),
 *   }),
 *   sources: [
 *     new JsonSource({ file: "app.json", required: false }),
 *     new EnvSource({ prefix: "APP_", lowercase: true }),
 *     new ArgvSource({ invocation: CommanderInvocation.fromCommand(command) }),
 *   ],
 * })
 *
 * config.get("format")       // "json"
 * config.explain("format")   // "argv"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Explains which source provided the final value at a key path.
   *
   * @param path - Dotted leaf path, e.g. "serve.port".
   * @returns The source name (e.g. "env", "argv"), or "default" when the
   *   value came from a schema default.
   */
  explain(path: string): string

  /**
   * Names of the sources that contributed at least one value, in the order
   * they were applied, followed by "default" when schema defaults were used.
   */
  sourcesUsed(): string[]

  /**
   * Dotted leaf paths present in sources but dropped by the schema.
   *
   * Useful for detecting typos, stale config, or misconfigured sources.
   */
  unknownKeys(): string[]
}
